/**
 * @lockbox/demo: Custody walkthrough.
 */

export { runWalkthrough, TOTAL_STEPS } from "./walkthrough.js";
export type { DemoLine } from "./walkthrough.js";
export { banner, renderLine } from "./render.js";
