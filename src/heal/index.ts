/**
 * @entry Heal 自愈模块
 *
 * - SelfHealingController: 闸门 + 执行 + 上报
 * - SystemCommandRunner: HealingAction → argv
 * - safety: 排除集合与受保护路径
 */

export { SelfHealingController, type SelfHealingControllerOptions, type AlertSink } from './SelfHealingController.js'
export { SystemCommandRunner, buildCommands } from './SystemCommandRunner.js'
export type { CommandRunner, CommandRunResult } from './types.js'
export {
  buildExclusionSet,
  checkProcessTarget,
  checkServiceTarget,
  checkStaleFileTarget,
  type ExclusionSet,
  type GateResult,
} from './safety.js'
