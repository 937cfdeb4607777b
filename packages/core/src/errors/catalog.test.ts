import { describe, it, expect } from 'vitest'
import {
  StoreError,
  InvalidHashLengthError,
  InvalidIndexError,
  InvalidDurationError,
  InvalidRegexError,
  InvalidRemotePathError,
  NoMatchingRemoteFileError,
  InvalidUsageError,
  MissingRemoteFilesError,
  UnknownHostError,
  NoHostsConfiguredError,
  AmbiguousHostError,
  RemoteToolMissingError,
  RemoteCommandFailureError,
  HashCountMismatchError,
  StatCountMismatchError,
  VerificationMismatchError,
  isStoreError,
} from './catalog.js'

describe('StoreError', () => {
  it('has errorCode, message, details and exitCode', () => {
    const err = new StoreError('BAD_INPUT', 'Bad input', { field: 'x' }, 2)

    expect(err.errorCode).toBe('BAD_INPUT')
    expect(err.message).toBe('Bad input')
    expect(err.details).toEqual({ field: 'x' })
    expect(err.exitCode).toBe(2)
    expect(new StoreError('X', 'x').exitCode).toBe(1)
  })

  it('toJSON() returns serializable object', () => {
    const err = new StoreError('BAD_INPUT', 'Bad input', { field: 'name' })

    expect(err.toJSON()).toEqual({
      error: {
        errorCode: 'BAD_INPUT',
        message: 'Bad input',
        details: { field: 'name' },
      },
    })

    // Omits details when undefined
    expect(new StoreError('BAD_INPUT', 'Bad input').toJSON()).toEqual({
      error: { errorCode: 'BAD_INPUT', message: 'Bad input' },
    })
  })

  it('subclasses carry error code and exit code', () => {
    const cases: Array<{ err: StoreError; errorCode: string; exitCode: number }> = [
      { err: new InvalidHashLengthError({ length: 0 }), errorCode: 'INVALID_HASH_LENGTH', exitCode: 2 },
      { err: new InvalidIndexError({ index: 5, numFiles: 3 }), errorCode: 'INVALID_INDEX', exitCode: 2 },
      { err: new InvalidDurationError({ input: 'x', reason: 'y' }), errorCode: 'INVALID_DURATION', exitCode: 2 },
      { err: new InvalidRegexError({ pattern: '(', reason: 'y' }), errorCode: 'INVALID_REGEX', exitCode: 2 },
      { err: new InvalidRemotePathError({ path: 'x' }), errorCode: 'INVALID_REMOTE_PATH', exitCode: 2 },
      { err: new UnknownHostError({ alias: 'x' }), errorCode: 'UNKNOWN_HOST', exitCode: 2 },
      { err: new NoHostsConfiguredError(), errorCode: 'NO_HOSTS_CONFIGURED', exitCode: 2 },
      { err: new AmbiguousHostError({ aliases: ['a', 'b'] }), errorCode: 'AMBIGUOUS_HOST', exitCode: 2 },
      { err: new InvalidUsageError({ reason: 'x' }), errorCode: 'INVALID_USAGE', exitCode: 2 },
      { err: new MissingRemoteFilesError({ expected: 2, found: 1 }), errorCode: 'MISSING_REMOTE_FILES', exitCode: 1 },
      { err: new NoMatchingRemoteFileError({ file: 'f', token: 't' }), errorCode: 'NO_MATCHING_REMOTE_FILE', exitCode: 1 },
      { err: new RemoteToolMissingError({ tool: 'sha256sum' }), errorCode: 'REMOTE_TOOL_MISSING', exitCode: 1 },
      { err: new RemoteCommandFailureError({ operation: 'op', exitCode: 3 }), errorCode: 'REMOTE_COMMAND_FAILURE', exitCode: 1 },
      { err: new HashCountMismatchError({ expected: 2, actual: 1 }), errorCode: 'HASH_COUNT_MISMATCH', exitCode: 1 },
      { err: new StatCountMismatchError({ expected: 2, actual: 1, strategy: 'bulk' }), errorCode: 'STAT_COUNT_MISMATCH', exitCode: 1 },
      { err: new VerificationMismatchError({ checked: 1, mismatches: [] }), errorCode: 'VERIFICATION_MISMATCH', exitCode: 1 },
    ]

    for (const { err, errorCode, exitCode } of cases) {
      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(StoreError)
      expect(isStoreError(err)).toBe(true)
      expect(err.errorCode).toBe(errorCode)
      expect(err.exitCode).toBe(exitCode)
    }
  })

  it('error name property is set to the class name', () => {
    expect(new StoreError('X', 'x').name).toBe('StoreError')
    expect(new InvalidIndexError({ index: 1, numFiles: 0 }).name).toBe('InvalidIndexError')
    expect(new RemoteToolMissingError({ tool: 'find' }).name).toBe('RemoteToolMissingError')
  })

  it('isStoreError rejects plain errors', () => {
    expect(isStoreError(new Error('x'))).toBe(false)
    expect(isStoreError('x')).toBe(false)
  })
})

describe('messages', () => {
  it('names the offending length', () => {
    expect(new InvalidHashLengthError({ length: 65 }).message).toBe(
      'Invalid hash length 65: must be between 1 and 64',
    )
  })

  it('appends trimmed stderr to remote failures', () => {
    expect(
      new RemoteCommandFailureError({ operation: 'Renaming x', exitCode: 1, stderr: 'denied\n' })
        .message,
    ).toBe('Renaming x exited with 1: denied')
    expect(new RemoteCommandFailureError({ operation: 'Renaming x', exitCode: 1 }).message).toBe(
      'Renaming x exited with 1',
    )
  })

  it('lists every verification mismatch', () => {
    const err = new VerificationMismatchError({
      checked: 3,
      mismatches: [
        { relativePath: 'aaaa/x', expected: 'aaaa', actual: 'bbbb' },
        { relativePath: 'cccc/y', expected: 'cccc', actual: 'dddd' },
      ],
    })

    expect(err.message).toBe(
      "2 of 3 files failed verification: 'aaaa/x' (expected 'aaaa', found 'bbbb'), " +
        "'cccc/y' (expected 'cccc', found 'dddd')",
    )
    expect(err.mismatches).toHaveLength(2)
  })
})
