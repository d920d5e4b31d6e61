export { analyzeLinkBudget } from './analyze'
export type { AnalyzeOptions } from './analyze'

export { linkBudgetArgsSchema, resolveLinkBudgetInput, toFlag, withoutBlankValues } from './inputs'
export type { LinkBudgetArgs } from './inputs'

export { describeLookAngles, describeStage, toJsonRecord } from './report'
export type { LinkBudgetRecord } from './report'
