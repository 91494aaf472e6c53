/**
 * ZkProgramVerifier.ts - Verifier binding for o1js ZkProgram proofs
 *
 * Takes a proof serialized with `proof.toJSON()` and checks it against the
 * circuit's verification key. The circuit must declare its four public
 * inputs in the order the market expects.
 */

import { Field, verify, type JsonProof, type VerificationKey } from 'o1js';
import { type ProofVerifier, isProofEnvelope, parseProofJson, parsePublicInput } from './ProofVerifier.js';
import { MarketError, assertThat } from './MarketError.js';

export class ZkProgramVerifier implements ProofVerifier {
  constructor(private readonly verificationKey: string | VerificationKey) {}

  async verify(proof: string): Promise<Field[]> {
    const jsonProof = toJsonProof(parseProofJson(proof));
    const valid = await verify(jsonProof, this.verificationKey);
    assertThat(valid, 'PROOF_REJECTED');
    return parsePublicInput(jsonProof.publicInput);
  }
}

function toJsonProof(value: unknown): JsonProof {
  if (!isProofEnvelope(value)) {
    throw new MarketError('INVALID_PROOF_FORMAT', 'missing publicInput array');
  }
  const proof = 'proof' in value ? value.proof : undefined;
  if (typeof proof !== 'string') {
    throw new MarketError('INVALID_PROOF_FORMAT', 'missing proof');
  }
  const maxProofsVerified = 'maxProofsVerified' in value ? value.maxProofsVerified : undefined;
  if (maxProofsVerified !== 0 && maxProofsVerified !== 1 && maxProofsVerified !== 2) {
    throw new MarketError('INVALID_PROOF_FORMAT', 'maxProofsVerified must be 0, 1 or 2');
  }
  const publicOutput =
    'publicOutput' in value && Array.isArray(value.publicOutput)
      ? value.publicOutput.filter((output): output is string => typeof output === 'string')
      : [];

  return {
    publicInput: value.publicInput,
    publicOutput,
    maxProofsVerified,
    proof,
  };
}
