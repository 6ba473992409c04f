export class OperatorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OperatorError'
  }
}

export class OperatorConfigError extends OperatorError {
  readonly variable: string

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`)
    this.name = 'OperatorConfigError'
    this.variable = variable
  }
}

export class ScalingNotSupportedError extends OperatorError {
  readonly holder: string | null

  constructor(holder: string | null) {
    super(
      holder
        ? `Scaling is not implemented for this operator: ${holder} is the active instance`
        : 'Scaling is not implemented for this operator',
    )
    this.name = 'ScalingNotSupportedError'
    this.holder = holder
  }
}

export class InvalidEventError extends OperatorError {
  readonly kind: string

  constructor(kind: string, details: string) {
    super(`Invalid ${kind} event: ${details}`)
    this.name = 'InvalidEventError'
    this.kind = kind
  }
}

export class PebbleApiError extends OperatorError {
  readonly statusCode: number

  constructor(statusCode: number, message: string) {
    super(`Pebble API error (${statusCode}): ${message}`)
    this.name = 'PebbleApiError'
    this.statusCode = statusCode
  }
}

export class PebbleChangeError extends OperatorError {
  readonly changeId: string

  constructor(changeId: string, message: string) {
    super(`Pebble change ${changeId} failed: ${message}`)
    this.name = 'PebbleChangeError'
    this.changeId = changeId
  }
}

export const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)))
