/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { process } from "./processor";
export { stats, formatStats } from "./stats";
