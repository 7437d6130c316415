/**
 * Request hashing.
 *
 * requestHash = keccak256(abi.encode(keccak256(pack(request)), dispatcher, chainId))
 *
 * `pack` hashes the dynamic fields and leaves `signature` out, so the
 * signature can be produced over the hash. The default authorization arm
 * signs a second, account-bound digest on top of it.
 */

import { encodeAbiParameters, keccak256, parseAbiParameters } from "viem";
import type { Address, AuthorizationRequest, ChainId, Hex } from "@tessera/types";

const PACKED_REQUEST_PARAMS = parseAbiParameters(
  "address, uint256, bytes32, bytes32, uint256, uint256, uint256, uint256, uint256, bytes32",
);

const DOMAIN_PARAMS = parseAbiParameters("bytes32, address, uint256");

export function packRequest(request: AuthorizationRequest): Hex {
  return encodeAbiParameters(PACKED_REQUEST_PARAMS, [
    request.sender,
    request.nonce,
    keccak256(request.initCode),
    keccak256(request.callData),
    request.callGasLimit,
    request.verificationGasLimit,
    request.preVerificationGas,
    request.maxFeePerGas,
    request.maxPriorityFeePerGas,
    keccak256(request.paymasterAndData),
  ]);
}

export function getRequestHash(
  request: AuthorizationRequest,
  dispatcher: Address,
  chainId: ChainId,
): Hex {
  return keccak256(
    encodeAbiParameters(DOMAIN_PARAMS, [
      keccak256(packRequest(request)),
      dispatcher,
      BigInt(chainId),
    ]),
  );
}

/**
 * Digest the default arm recovers a signer from:
 * keccak256(abi.encode(requestHash, account, chainId)), signed as an
 * EIP-191 personal message.
 */
export function defaultAuthorizationDigest(
  requestHash: Hex,
  account: Address,
  chainId: ChainId,
): Hex {
  return keccak256(
    encodeAbiParameters(DOMAIN_PARAMS, [requestHash, account, BigInt(chainId)]),
  );
}
