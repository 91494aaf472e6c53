/**
 * ProofVerifier.ts - Boundary to the external proof system
 *
 * A verifier only attests that a proof is well-formed for its circuit and
 * hands back the public inputs. Whether those inputs are the ones a market
 * expects (root, nullifier, commitment, market id) is for the market to check.
 */

import { Struct, Field } from 'o1js';
import { PUBLIC_INPUT_COUNT } from '../types/Constants.js';
import { MarketError, assertThat, isMarketError } from './MarketError.js';

export interface ProofVerifier {
  /**
   * Verifies a serialized proof and returns its public inputs in order.
   * Throws when the proof does not verify.
   */
  verify(proof: string): Promise<Field[]>;
}

/**
 * Public inputs of a membership (betting) proof
 */
export class MembershipPublicInputs extends Struct({
  merkleRoot: Field,
  nullifier: Field,
  betCommitment: Field,
  marketId: Field,
}) {
  asFields(): Field[] {
    return [this.merkleRoot, this.nullifier, this.betCommitment, this.marketId];
  }
}

/**
 * Public inputs of a claim proof
 */
export class ClaimPublicInputs extends Struct({
  betCommitment: Field,
  winningOutcome: Field,
  marketId: Field,
  nullifier: Field,
}) {
  asFields(): Field[] {
    return [this.betCommitment, this.winningOutcome, this.marketId, this.nullifier];
  }
}

export async function verifyMembershipProof(
  verifier: ProofVerifier,
  proof: string
): Promise<MembershipPublicInputs> {
  const [merkleRoot, nullifier, betCommitment, marketId] = await verifyPublicInputs(verifier, proof);
  return new MembershipPublicInputs({ merkleRoot, nullifier, betCommitment, marketId });
}

export async function verifyClaimProof(verifier: ProofVerifier, proof: string): Promise<ClaimPublicInputs> {
  const [betCommitment, winningOutcome, marketId, nullifier] = await verifyPublicInputs(verifier, proof);
  return new ClaimPublicInputs({ betCommitment, winningOutcome, marketId, nullifier });
}

async function verifyPublicInputs(verifier: ProofVerifier, proof: string): Promise<Field[]> {
  let publicInputs: Field[];
  try {
    publicInputs = await verifier.verify(proof);
  } catch (error) {
    if (isMarketError(error)) throw error;
    throw new MarketError('PROOF_REJECTED', error instanceof Error ? error.message : String(error));
  }

  assertThat(
    publicInputs.length === PUBLIC_INPUT_COUNT,
    'INVALID_PUBLIC_INPUTS',
    `got ${publicInputs.length}`
  );
  return publicInputs;
}

// ========== Serialized proofs ==========

/**
 * The part of a serialized proof every verifier reads: its public inputs as
 * decimal strings (same shape as an o1js JsonProof).
 */
export interface ProofEnvelope {
  publicInput: string[];
}

export function parseProofJson(proof: string): unknown {
  try {
    return JSON.parse(proof);
  } catch (error) {
    throw new MarketError('INVALID_PROOF_FORMAT', error instanceof Error ? error.message : String(error));
  }
}

export function isProofEnvelope(value: unknown): value is ProofEnvelope {
  if (typeof value !== 'object' || value === null || !('publicInput' in value)) return false;
  const { publicInput } = value;
  return Array.isArray(publicInput) && publicInput.every((input) => typeof input === 'string');
}

export function parsePublicInput(values: string[]): Field[] {
  return values.map((value) => {
    assertThat(/^\d+$/.test(value), 'INVALID_PROOF_FORMAT', `public input "${value}"`);
    const parsed = BigInt(value);
    assertThat(parsed < Field.ORDER, 'INVALID_PROOF_FORMAT', 'public input exceeds field modulus');
    return Field(parsed);
  });
}
