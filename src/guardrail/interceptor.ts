import type { AuditLogger } from '../audit/service.js'
import { getSafeErrorMessage, type SafeErrorKind } from './messages.js'

export interface SafeErrorResponse {
  error: string
}

export interface SafeErrorOptions {
  /** Where handler failures are recorded. */
  audit?: AuditLogger
  /** Which safe message to return. Default: technical */
  kind?: SafeErrorKind
  /** Name recorded with the failure, e.g. the route. */
  name?: string
}

/**
 * Wrap a transport handler so a thrown error becomes a safe, generic reply.
 *
 * Usage:
 *   const chat = withSafeErrors(handleChat, { audit, name: 'POST /chat' })
 *   const reply = await chat(request)
 */
export function withSafeErrors<TArgs extends unknown[], TResult>(
  handler: (...args: TArgs) => Promise<TResult>,
  options: SafeErrorOptions = {}
): (...args: TArgs) => Promise<TResult | SafeErrorResponse> {
  const kind = options.kind ?? 'technical'

  return async (...args: TArgs) => {
    try {
      return await handler(...args)
    } catch (error) {
      options.audit?.emit({
        category: 'security',
        action: 'handler.error',
        severity: 'alert',
        metadata: {
          handler: options.name ?? (handler.name || 'anonymous'),
          errorName: error instanceof Error ? error.name : typeof error,
          errorMessage: error instanceof Error ? error.message : String(error),
        },
      })
      return { error: getSafeErrorMessage(kind) }
    }
  }
}

export function isSafeErrorResponse(value: unknown): value is SafeErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'error' in value &&
    typeof value.error === 'string'
  )
}
