/**
 * CLI UI module exports
 */

import * as output from "./output";

export { banner, color, error, info, success, VERSION } from "./output";

export const ui = {
  banner: output.banner,
  info: output.info,
  success: output.success,
  error: output.error,
};
