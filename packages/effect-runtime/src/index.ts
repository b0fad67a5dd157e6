export { TokenizerFrom } from "./layers.js";

export {
  prettyLogger,
  withSpan,
  parseLogLevel,
  loggerLayer,
} from "./logging.js";
