/**
 * framecheck public API
 *
 * @example
 * ```typescript
 * import { createSchemaFlowEngine, formatReport } from "framecheck";
 *
 * const engine = await createSchemaFlowEngine();
 * const result = await engine.run([{ path: "etl/users.py" }]);
 * console.log(formatReport(result.diagnostics, result.filesChecked, "human"));
 * await engine.close();
 * ```
 */

export * from "./core/index.js";
export { loadConfig, parseConfig, defaultConfig, CONFIG_FILE, type LoadedConfig } from "./utils/config.js";
export { FrameCheckConfigSchema, type FrameCheckConfig } from "./utils/validation.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
