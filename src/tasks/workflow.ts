/**
 * @fileoverview Chain, group and chord construction. Like a task queue's
 * own workflow builders, these link the given signatures in place: chain
 * members get `onSuccess` pointers, group members share a group UUID and
 * task count, and chord members point at the callback.
 * @module src/tasks/workflow
 */
import { BridgeError, BridgeErrorCode } from '../types-global/errors.js';
import { generateUUID } from '../utils/security/idGenerator.js';
import { generateTaskUUID } from './signature.js';
import type { Chain, Chord, Group, Signature } from './types.js';

function ensureUUID(signature: Signature): void {
  if (!signature.uuid) {
    signature.uuid = generateTaskUUID();
  }
}

/**
 * Links `signatures` so each one triggers the next on success.
 */
export function createChain(...signatures: Signature[]): Chain {
  signatures.forEach(ensureUUID);
  for (let i = signatures.length - 1; i > 0; i--) {
    const previous = signatures[i - 1];
    const current = signatures[i];
    if (previous && current) {
      previous.onSuccess = [current];
    }
  }
  return { tasks: signatures };
}

/**
 * Puts `signatures` under one new group UUID.
 */
export function createGroup(...signatures: Signature[]): Group {
  const groupUUID = `group_${generateUUID()}`;
  for (const signature of signatures) {
    ensureUUID(signature);
    signature.groupUUID = groupUUID;
    signature.groupTaskCount = signatures.length;
  }
  return { groupUUID, tasks: signatures };
}

/**
 * Attaches `callback` to every member of `group`.
 * @throws {BridgeError} `ValidationError` when the group has no tasks.
 */
export function createChord(group: Group, callback: Signature): Chord {
  if (group.tasks.length === 0) {
    throw new BridgeError(
      BridgeErrorCode.ValidationError,
      'A chord requires a group with at least one task.',
      { groupUUID: group.groupUUID, callback: callback.name },
    );
  }
  ensureUUID(callback);
  for (const signature of group.tasks) {
    signature.chordCallback = callback;
  }
  return { group, callback };
}

/**
 * Member task UUIDs in group order.
 */
export function getGroupUUIDs(group: Group): string[] {
  return group.tasks.map((task) => task.uuid);
}
