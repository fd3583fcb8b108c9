/**
 * @entry Config 配置模块
 *
 * 加载 YAML 配置、Schema 校验、模板初始化
 */

export {
  loadConfig,
  resolveConfig,
  findConfigPaths,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
  collectUnknownKeys,
  CONFIG_FILENAME,
  type LoadConfigOptions,
} from './loadConfig.js'
export { initProject, DEFAULT_CONFIG } from './initProject.js'
export * from './schema.js'
