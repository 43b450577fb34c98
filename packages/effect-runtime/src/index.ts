export {
  TokenizerFrom,
  TokenizerFromDir,
} from "./layers.js";

export {
  prettyLogger,
  loggerLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
