import { describe, it, expect } from "vitest";
import { actionFor, cacheKey, createRuleContext } from "../rule-engine.ts";
import type { AutomationProfile, AutomationToggles } from "../types.ts";
import { finished, mounted, preferences } from "./helpers.ts";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function context(profile: AutomationProfile = "balanced", toggles: Partial<AutomationToggles> = {}) {
  return createRuleContext(
    preferences({
      profile,
      toggles: { quickEDAOnMount: true, cleanOnHighNulls: true, plotsOnMissing: true, ...toggles },
    }),
    NOW,
  );
}

// ── Dataset Mounted ─────────────────────────────────────────────────────────

describe("actionFor dataset_mounted", () => {
  it("runs Quick EDA on the mounted file", () => {
    expect(actionFor(mounted("/data/sales.csv", 12), context())).toEqual({
      playbook: {
        identifier: "eda-basic",
        dataset: "/data/sales.csv",
        parameters: {},
        description: "Running Quick EDA on sales.csv",
      },
      cacheKey: "datasetMounted::file:///data/sales.csv",
    });
  });

  it("accepts exactly 50 MB and rejects anything larger", () => {
    expect(actionFor(mounted("/d/a.csv", 50), context())).not.toBeNull();
    expect(actionFor(mounted("/d/a.csv", 50.0001), context())).toBeNull();
    expect(actionFor(mounted("/d/a.csv", 51), context())).toBeNull();
  });

  it("respects the toggle and the off profile", () => {
    expect(actionFor(mounted(), context("balanced", { quickEDAOnMount: false }))).toBeNull();
    expect(actionFor(mounted(), context("off"))).toBeNull();
  });
});

// ── Run Finished ────────────────────────────────────────────────────────────

describe("actionFor run_finished", () => {
  it("cleans when nulls reach the threshold", () => {
    const action = actionFor(finished({ nullPercentage: 0.3 }), context("balanced"));
    expect(action).toEqual({
      playbook: {
        identifier: "clean-profile",
        dataset: "/data/sales.csv",
        parameters: {},
        description: "Cleaning high nulls",
      },
      cacheKey: "clean-high-nulls::file:///data/sales.csv",
    });
  });

  it("does not clean below the threshold", () => {
    expect(actionFor(finished({ nullPercentage: 0.29 }), context("balanced"))).toBeNull();
  });

  it("prefers cleaning over plots in aggressive mode", () => {
    const action = actionFor(
      finished({ nullPercentage: 0.5, madeImages: false }),
      context("aggressive"),
    );
    expect(action?.playbook.identifier).toBe("clean-profile");
  });

  it("adds plots in aggressive mode when no images were made", () => {
    const action = actionFor(
      finished({ dataset: null, nullPercentage: 0.1, madeImages: false }),
      context("aggressive"),
    );
    expect(action).toEqual({
      playbook: {
        identifier: "eda-basic",
        dataset: null,
        parameters: { mode: "plots" },
        description: "Adding plots",
      },
      cacheKey: "missing-plots::global",
    });
  });

  it("omits mode=plots when plots were already produced", () => {
    const action = actionFor(
      finished({ artifacts: ["plots"], madeImages: false }),
      context("aggressive"),
    );
    expect(action?.playbook.parameters).toEqual({});
  });

  it("never adds plots in balanced mode", () => {
    expect(actionFor(finished({ madeImages: false }), context("balanced"))).toBeNull();
  });

  it("respects the cleaning toggle", () => {
    expect(
      actionFor(finished({ nullPercentage: 0.9 }), context("balanced", { cleanOnHighNulls: false })),
    ).toBeNull();
  });
});

describe("actionFor other events", () => {
  it("ignores app_became_active", () => {
    expect(actionFor({ type: "app_became_active" }, context("aggressive"))).toBeNull();
  });
});

describe("cacheKey", () => {
  it("percent-encodes the dataset path as a file URL", () => {
    expect(cacheKey("datasetMounted", "/data/my sales.csv")).toBe(
      "datasetMounted::file:///data/my%20sales.csv",
    );
  });

  it("uses global without a dataset", () => {
    expect(cacheKey("missing-plots", null)).toBe("missing-plots::global");
  });
});
