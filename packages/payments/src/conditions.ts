/**
 * Conditional payment checks.
 *
 * validateCondition() runs when the payment is created;
 * assertConditionMet() runs when the verifier submits a proof.
 */

import { StateError, ThresholdError, ValidationError } from "@ledgerline/ledger";
import type { PaymentCondition, FulfillmentProof, PresenceChecker } from "./types.js";

export function validateCondition(
  condition: PaymentCondition,
  presence: PresenceChecker | undefined,
  deadline: number | undefined,
): void {
  switch (condition.type) {
    case "time": {
      const notBefore = Date.parse(condition.notBefore);
      if (!Number.isFinite(notBefore)) {
        throw new ValidationError("INVALID_CONDITION", `Invalid notBefore: "${condition.notBefore}"`);
      }
      if (deadline !== undefined && notBefore > deadline) {
        throw new ValidationError("INVALID_CONDITION", "The condition cannot be met before the deadline");
      }
      return;
    }
    case "signatures": {
      const unique = new Set(condition.signers);
      if (condition.signers.length === 0 || unique.size !== condition.signers.length) {
        throw new ValidationError("INVALID_CONDITION", "Signers must be a non-empty list without duplicates");
      }
      if (!Number.isInteger(condition.required) || condition.required < 1 || condition.required > unique.size) {
        throw new ValidationError(
          "INVALID_CONDITION",
          `Required signatures must be between 1 and ${String(unique.size)}, got ${String(condition.required)}`,
        );
      }
      return;
    }
    case "contract-presence":
      if (condition.address.length === 0) {
        throw new ValidationError("INVALID_CONDITION", "A presence condition needs an address");
      }
      if (presence === undefined) {
        throw new ValidationError("INVALID_CONDITION", "No presence checker is configured");
      }
      return;
    case "custom":
      if (condition.description.trim().length === 0) {
        throw new ValidationError("INVALID_CONDITION", "A custom condition needs a description");
      }
      return;
  }
}

export function assertConditionMet(
  condition: PaymentCondition,
  proof: FulfillmentProof,
  now: number,
  presence: PresenceChecker | undefined,
): void {
  switch (condition.type) {
    case "time":
      if (now < Date.parse(condition.notBefore)) {
        throw new StateError("CONDITION_NOT_MET", `Not fulfillable before ${condition.notBefore}`, {
          notBefore: condition.notBefore,
        });
      }
      return;
    case "signatures": {
      if (proof.signatures === undefined) {
        throw new ValidationError("INVALID_PROOF", "A signatures condition needs a list of signatures");
      }
      const valid = new Set(proof.signatures.filter((s) => condition.signers.includes(s)));
      if (valid.size < condition.required) {
        throw new ThresholdError(
          "SIGNATURES_NOT_MET",
          `${String(valid.size)} of ${String(condition.required)} required signatures`,
          { signed: valid.size, required: condition.required },
        );
      }
      return;
    }
    case "contract-presence":
      if (presence === undefined || !presence.isPresent(condition.address)) {
        throw new StateError("CONDITION_NOT_MET", `Nothing is present at "${condition.address}"`, {
          address: condition.address,
        });
      }
      return;
    case "custom":
      if (proof.approved === undefined) {
        throw new ValidationError("INVALID_PROOF", "A custom condition needs the verifier's verdict");
      }
      if (!proof.approved) {
        throw new StateError("CONDITION_NOT_MET", `Condition "${condition.description}" was not approved`);
      }
      return;
  }
}
