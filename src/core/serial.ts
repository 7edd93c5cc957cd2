/**
 * Serial and Lineage Policy
 *
 * Every document pushed by a split carries the serial it was pulled with
 * plus one, and the lineage it was pulled with. Lineages are never invented
 * for existing states and never copied between directories.
 */

import type { StateDocument } from '../state/types.js';

/**
 * Stamp an updated document for pushing back to the directory it was pulled from.
 *
 * @param pulled - Document as pulled from the backend
 * @param updated - Document with the split applied
 * @returns Copy of `updated` with serial = pulled.serial + 1 and pulled's lineage
 */
export function finalizeForPush(pulled: StateDocument, updated: StateDocument): StateDocument {
  return {
    ...updated,
    serial: pulled.serial + 1,
    lineage: pulled.lineage,
  };
}

/**
 * Check that a finalized document follows the policy.
 *
 * @throws Error if the serial or lineage is wrong
 */
export function verifyFinalized(pulled: StateDocument, finalized: StateDocument): void {
  if (finalized.lineage !== pulled.lineage) {
    throw new Error(
      `Refusing to push: lineage ${finalized.lineage} differs from pulled lineage ${pulled.lineage}`
    );
  }
  if (finalized.serial !== pulled.serial + 1) {
    throw new Error(
      `Refusing to push: serial ${finalized.serial} is not pulled serial ${pulled.serial} + 1`
    );
  }
}
