/**
 * autoflow-crew
 *
 * Guarded event automation for data-analysis playbooks, plus a blackboard
 * scheduler that drives a small crew of agents toward a plan contract.
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
