/**
 * @entry Metrics 指标采集模块
 *
 * - MetricSource: 查询接口
 * - SystemMetricSource: 基于系统命令的实现
 * - collectSnapshot: 并发采集并冻结一次快照
 */

export type { MetricSource } from './types.js'
export { SystemMetricSource, type SystemMetricSourceOptions } from './SystemMetricSource.js'
export { collectSnapshot } from './collectSnapshot.js'
export {
  parseMpstat,
  parseFree,
  parseFreeSwap,
  parseLoadavg,
  parseZombieCount,
  parseThermalMillidegrees,
  parseDf,
  parseServiceState,
  parseSsListeners,
  parsePs,
  normalizeListenAddress,
} from './parsers.js'
