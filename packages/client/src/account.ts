import { decodeAccountInfo, emptyAccountInfo } from '@subreg/codec'
import type { AccountId, AccountInfo, SafePromise, StorageKeyError } from '@subreg/types'
import { safeError, safeResult } from '@subreg/types'
import type { ReadError, StateReader } from './state-reader'

/**
 * System.Account for `account`; an account with nothing stored is all zeros
 */
export async function fetchAccountInfo(
  reader: StateReader,
  account: AccountId,
): SafePromise<AccountInfo, ReadError | StorageKeyError> {
  const [error, raw] = await reader.readItem('System', 'Account', [account])
  if (error) return safeError(error)
  return safeResult(raw === undefined ? emptyAccountInfo() : decodeAccountInfo(raw))
}
