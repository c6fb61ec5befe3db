import { type BaseError, createError } from "@barconf/errors"

export type LockErrorCode = "lock_commit_during_read" | "lock_lease_released" | "lock_invalid_option"

export type LockError = BaseError<LockErrorCode>

export function commitDuringReadError(activeReaders: number): LockError {
  return createError("lock_commit_during_read", "Cannot commit while read sections are active", {
    context: { activeReaders },
    isOperational: false,
  })
}

export function leaseReleasedError(): LockError {
  return createError("lock_lease_released", "Write lease was already released", {
    isOperational: false,
  })
}

export function invalidOptionError(name: string, value: unknown): LockError {
  return createError("lock_invalid_option", `${name} must be a finite, non-negative number`, {
    context: { name, value },
  })
}
