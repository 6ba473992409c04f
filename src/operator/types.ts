export type DeferRetry = { _tag: 'DeferRetry'; reason: string }

export type Block = { _tag: 'Block'; reason: string }

export type GateResult<Facts = undefined> = { _tag: 'Proceed'; facts: Facts } | DeferRetry | Block

export type UnitStatus = { _tag: 'Active' } | { _tag: 'Waiting'; reason: string } | { _tag: 'Blocked'; reason: string }

export type EventOutcome = 'completed' | 'deferred' | 'ignored'

export type ConfigReconcileResult = 'changed' | 'unchanged'

export const deferRetry = (reason: string): DeferRetry => ({ _tag: 'DeferRetry', reason })

export const block = (reason: string): Block => ({ _tag: 'Block', reason })

export const activeStatus = (): UnitStatus => ({ _tag: 'Active' })

export const formatUnitStatus = (status: UnitStatus) =>
  status._tag === 'Active' ? 'active' : `${status._tag.toLowerCase()}: ${status.reason}`
