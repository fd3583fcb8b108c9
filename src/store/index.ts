/**
 * @entry Store 本地状态
 *
 * 守护进程只持久化两样东西：PID 锁（见 scheduler/pidLock）和最近一次循环摘要
 */

export { DATA_DIR, PID_FILE, DAEMON_LOG_FILE, LAST_CYCLE_FILE } from './paths.js'
export { readJson, writeJson, ensureDir, type JsonWriteOptions } from './readWriteJson.js'
export { saveLastCycle, readLastCycle, cycleSummarySchema, type CycleSummary } from './lastCycle.js'
