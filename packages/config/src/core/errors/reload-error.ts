import { BaseError } from "@stratum/errors"
import { describeCause } from "./describe-cause"

export type ReloadErrorCode = "reload_failed"

/**
 * The previous state is still in place, so the reload can be retried once
 * the offending source is fixed.
 */
export class ReloadError extends BaseError<ReloadErrorCode> {
  static failed(cause: unknown): ReloadError {
    return new ReloadError(`Failed to reload config: ${describeCause(cause)}`, {
      code: "reload_failed",
      cause,
      isRetryable: true,
    })
  }
}
