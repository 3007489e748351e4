export { LOG_LEVELS, loadDecoderConfig } from './config.js';
export type { DecoderConfig, LogLevel } from './config.js';
export { createLogger } from './logger.js';
export { builtinPlugins, registerBuiltinPlugins } from './plugins/builtin-plugins.js';
export type { RegisterBuiltinOptions } from './plugins/builtin-plugins.js';
