/**
 * jobgraph CLI Commands
 *
 * Explicit command registration for OCLIF
 */

import Analyze from "./analyze.js";
import Optimize from "./optimize.js";

export { Analyze, Optimize };

export const COMMANDS = {
  analyze: Analyze,
  optimize: Optimize,
};
