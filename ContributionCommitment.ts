/**
 * Contribution Commitment
 *
 * Deterministic ledger keys: keccak256 over the ABI-packed
 * (sample, label, submissionTime, submitter) tuple, so a record can be found
 * again from the same tuple without ever storing the sample itself.
 *
 * The sample encoding is pluggable: fixed-width int64 vectors and raw byte
 * payloads ship here, and any other sample type supplies its own SampleCodec.
 */

import { ethers } from 'ethers';
import { ValidationError } from './errors';
import { Address, ContributionKey, Label, Timestamp } from './types';
import { assertLabel, assertTimestamp, normalizeAddress } from './utils/addresses';

export interface SampleCodec<TSample> {
  readonly kind: string;
  /** ABI-packed hex encoding used inside the commitment and in emitted events */
  pack(sample: TSample): string;
  /** Inverse of pack, for rebuilding samples from event history */
  unpack(encoded: string): TSample;
}

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;
const WORD_BYTES = 32;

/**
 * int64[] feature vectors in non-standard packed ABI mode:
 * every element sign-extended to a 32-byte word
 */
export const int64VectorCodec: SampleCodec<readonly bigint[]> = {
  kind: 'int64[]',

  pack(sample: readonly bigint[]): string {
    sample.forEach((value, index) => {
      if (value < INT64_MIN || value > INT64_MAX) {
        throw new ValidationError('INVALID_INPUT', `Sample feature ${index} is outside the int64 range`, {
          index,
          value: value.toString(),
        });
      }
    });
    return ethers.solidityPacked(['int64[]'], [sample]);
  },

  unpack(encoded: string): readonly bigint[] {
    const bytes = ethers.getBytes(encoded);
    if (bytes.length % WORD_BYTES !== 0) {
      throw new ValidationError('INVALID_INPUT', 'Encoded int64 vector is not word aligned', {
        length: bytes.length,
      });
    }
    const values: bigint[] = [];
    for (let offset = 0; offset < bytes.length; offset += WORD_BYTES) {
      const word = ethers.toBigInt(bytes.slice(offset, offset + WORD_BYTES));
      values.push(ethers.fromTwos(word, 256));
    }
    return values;
  },
};

/**
 * Arbitrary byte payloads (hex strings or byte arrays), committed as-is
 */
export const bytesSampleCodec: SampleCodec<string | Uint8Array> = {
  kind: 'bytes',

  pack(sample: string | Uint8Array): string {
    if (typeof sample === 'string' && !ethers.isHexString(sample)) {
      throw new ValidationError('INVALID_INPUT', 'Byte samples must be 0x-prefixed hex strings', {
        sample: sample.substring(0, 16),
      });
    }
    return ethers.hexlify(sample);
  },

  unpack(encoded: string): string {
    return ethers.hexlify(encoded);
  },
};

/**
 * Commit to an already-packed sample
 */
export function commitPacked(
  packedSample: string,
  label: Label,
  submissionTime: Timestamp,
  submitter: Address
): ContributionKey {
  return ethers.solidityPackedKeccak256(
    ['bytes', 'uint64', 'uint256', 'address'],
    [
      packedSample,
      assertLabel(label),
      assertTimestamp(submissionTime, 'submissionTime'),
      normalizeAddress(submitter, 'submitter'),
    ]
  );
}

export function computeContributionKey<TSample>(
  codec: SampleCodec<TSample>,
  sample: TSample,
  label: Label,
  submissionTime: Timestamp,
  submitter: Address
): ContributionKey {
  return commitPacked(codec.pack(sample), label, submissionTime, submitter);
}
