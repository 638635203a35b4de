export { systemClock } from "./system-clock.js";
export { realTimerService, realDelay, mathRandom } from "./real-timers.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createNodeFetchSessionFactory } from "./node-fetch-session.js";
