// ── Event Bus ────────────────────────────────────────────────────────────────
export {
  Subscription,
  type SubscribeOptions,
  EventBus,
} from "./event-bus.ts";
