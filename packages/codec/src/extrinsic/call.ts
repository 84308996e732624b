import type { AccountId, RegistrationRequest, Safe } from '@subreg/types'
import {
  BURNED_REGISTER_CALL_INDEX,
  type EncodeError,
  SUBTENSOR_MODULE_INDEX,
  safeError,
  safeResult,
} from '@subreg/types'
import { concatBytes, encodeAccountId } from '../core/bytes'
import { encodeFixedLength } from '../core/fixed-length'
import { encodeNetuid } from '../storage/storage-key'

/**
 * SubtensorModule.burned_register(netuid, hotkey), carrying the burn amount
 *
 *   module(8) ∥ call(1) ∥ netuid u16 ∥ hotkey(32) ∥ burn u64
 */
export function encodeBurnedRegisterCall(
  netuid: number,
  hotkey: AccountId,
  burnAmount: bigint,
): Safe<Uint8Array, EncodeError> {
  const [netuidError, encodedNetuid] = encodeNetuid(netuid)
  if (netuidError) return safeError(netuidError)
  const [hotkeyError, encodedHotkey] = encodeAccountId(hotkey)
  if (hotkeyError) return safeError(hotkeyError)
  const [burnError, encodedBurn] = encodeFixedLength(burnAmount, 8)
  if (burnError) return safeError(burnError)

  return safeResult(
    concatBytes(
      new Uint8Array([SUBTENSOR_MODULE_INDEX, BURNED_REGISTER_CALL_INDEX]),
      encodedNetuid,
      encodedHotkey,
      encodedBurn,
    ),
  )
}

export function encodeRegistrationCall(
  request: RegistrationRequest,
): Safe<Uint8Array, EncodeError> {
  return encodeBurnedRegisterCall(
    request.netuid,
    request.hotkey,
    request.burnAmount,
  )
}
