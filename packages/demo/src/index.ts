/**
 * @zoneledger/demo — Cross-Zone terminal walkthrough.
 *
 * @packageDocumentation
 */

export { runDemo } from "./demo.js";
export type { DemoOptions, DemoSummary } from "./demo.js";
