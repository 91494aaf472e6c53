/**
 * MockVerifier.ts - Stand-in proof verifier for tests and local mode
 *
 * Accepts any well-formed envelope and returns the public inputs it carries,
 * unless switched to rejecting. Lets the market logic be exercised without
 * generating proofs.
 */

import { Field } from 'o1js';
import {
  type ProofVerifier,
  type MembershipPublicInputs,
  type ClaimPublicInputs,
  isProofEnvelope,
  parseProofJson,
  parsePublicInput,
} from './ProofVerifier.js';
import { MarketError } from './MarketError.js';

export class MockVerifier implements ProofVerifier {
  private rejecting = false;

  /**
   * Serializes public inputs into a proof blob this verifier accepts
   */
  static encode(publicInput: Field[]): string {
    return JSON.stringify({ publicInput: publicInput.map((input) => input.toString()) });
  }

  static membershipProof(inputs: MembershipPublicInputs): string {
    return MockVerifier.encode(inputs.asFields());
  }

  static claimProof(inputs: ClaimPublicInputs): string {
    return MockVerifier.encode(inputs.asFields());
  }

  setRejecting(rejecting: boolean) {
    this.rejecting = rejecting;
  }

  async verify(proof: string): Promise<Field[]> {
    if (this.rejecting) {
      throw new MarketError('PROOF_REJECTED', 'verifier is rejecting');
    }
    const envelope = parseProofJson(proof);
    if (!isProofEnvelope(envelope)) {
      throw new MarketError('INVALID_PROOF_FORMAT', 'missing publicInput array');
    }
    return parsePublicInput(envelope.publicInput);
  }
}
