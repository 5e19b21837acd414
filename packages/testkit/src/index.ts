/**
 * Shared test helpers for the FM text index packages
 */

export { clock } from "./timers.js";
export { createRng, randomInt, randomText, randomSubstring, findAll } from "./text.js";
