import fs from 'fs'
import path from 'path'
import { sanitizeFilename } from './sanitizeFilename'

export const OVERWRITE_POLICIES = ['skip', 'replace', 'unique'] as const
export type OverwritePolicy = (typeof OVERWRITE_POLICIES)[number]

/** Upper bound on numbered variants tried under the `unique` policy. */
export const MAX_UNIQUE_SUFFIX = 9999

export class PathExhaustionError extends Error {
  constructor(public readonly desiredPath: string) {
    super(`Could not generate unique filename for ${path.basename(desiredPath)}`)
    this.name = 'PathExhaustionError'
  }
}

export class InvalidPolicyError extends Error {
  constructor(public readonly policy: string) {
    super(`Unknown overwrite policy: ${policy}`)
    this.name = 'InvalidPolicyError'
  }
}

export interface ResolvedOutputPath {
  path: string
  shouldSkip: boolean
}

export function isOverwritePolicy(value: string): value is OverwritePolicy {
  return OVERWRITE_POLICIES.some((policy) => policy === value)
}

/**
 * Decide where a job writes its output.
 * `isTaken` defaults to an existence check; the scheduler widens it to paths reserved by pending jobs.
 * @throws PathExhaustionError when every numbered variant up to MAX_UNIQUE_SUFFIX is taken
 * @throws InvalidPolicyError for an unknown policy
 */
export function resolveOutputPath(
  desiredPath: string,
  policy: string,
  isTaken: (candidate: string) => boolean = fs.existsSync
): ResolvedOutputPath {
  const dir = path.dirname(desiredPath)
  const target = path.join(dir, sanitizeFilename(path.basename(desiredPath)))

  switch (policy) {
    case 'skip':
      return { path: target, shouldSkip: isTaken(target) }
    case 'replace':
      return { path: target, shouldSkip: false }
    case 'unique':
      return { path: isTaken(target) ? uniqueVariant(target, isTaken) : target, shouldSkip: false }
    default:
      throw new InvalidPolicyError(policy)
  }
}

function uniqueVariant(target: string, isTaken: (candidate: string) => boolean): string {
  const dir = path.dirname(target)
  const ext = path.extname(target)
  const stem = path.basename(target, ext)
  for (let n = 1; n <= MAX_UNIQUE_SUFFIX; n++) {
    const candidate = path.join(dir, `${stem} (${n})${ext}`)
    if (!isTaken(candidate)) return candidate
  }
  throw new PathExhaustionError(target)
}
