/**
 * Entity extraction from claim text.
 *
 * Fixed pattern rules; only the first match of each pattern is kept and a
 * missing entity stays null.
 */

import type { ClaimEntities } from "../types/claim-context.js";

/**
 * Policy number patterns: AUTO-001, POL-123456, or "POLICY: <token>".
 * For the labelled form the token (group 2) is kept, not the label.
 */
export const POLICY_NUMBER_PATTERN = /(AUTO-\d+|POL-\d+|POLICY[:\s]+(\w+-?\d+))/i;

/** Dates: 2025-10-22 or 10/22/2025 */
export const INCIDENT_DATE_PATTERN = /(\d{4}-\d{2}-\d{2}|\d{1,2}\/\d{1,2}\/\d{4})/;

/**
 * Entities with every field null.
 */
export function emptyEntities(): ClaimEntities {
  return {
    policyNumber: null,
    claimantName: null,
    incidentDate: null,
    incidentLocation: null,
    vehicleInfo: null,
  };
}

/**
 * Extract claim entities from free text.
 */
export function extractEntities(text: string): ClaimEntities {
  const entities = emptyEntities();

  const policyMatch = POLICY_NUMBER_PATTERN.exec(text);
  if (policyMatch) {
    entities.policyNumber = policyMatch[2] ?? policyMatch[1] ?? null;
  }

  const dateMatch = INCIDENT_DATE_PATTERN.exec(text);
  if (dateMatch) {
    entities.incidentDate = dateMatch[1] ?? null;
  }

  return entities;
}
