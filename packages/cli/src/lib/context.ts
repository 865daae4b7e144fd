/**
 * State shared by the driver's commands during one run
 */

import type { Output } from "./io.js";

export interface CommandContext {
  output: Output;
  /** Exit code reported when the command completes without throwing */
  exitCode: number;
}

/**
 * Options declared on the root program
 */
export interface GlobalOptions {
  spec?: string;
  verbose?: boolean;
}
