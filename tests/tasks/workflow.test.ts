/**
 * @fileoverview Tests for chain, group and chord construction.
 * @module tests/tasks/workflow.test
 */
import { describe, expect, it } from 'vitest';

import { createSignature } from '../../src/tasks/signature.js';
import {
  createChain,
  createChord,
  createGroup,
  getGroupUUIDs,
} from '../../src/tasks/workflow.js';
import { BridgeError } from '../../src/types-global/errors.js';

describe('createChain', () => {
  it('links each task to the next on success', () => {
    const first = createSignature({ uuid: 't1', name: 'fetch' });
    const second = createSignature({ uuid: 't2', name: 'parse' });
    const third = createSignature({ uuid: 't3', name: 'store' });

    const chain = createChain(first, second, third);

    expect(chain.tasks).toEqual([first, second, third]);
    expect(first.onSuccess).toEqual([second]);
    expect(second.onSuccess).toEqual([third]);
    expect(third.onSuccess).toBeUndefined();
  });
});

describe('createGroup', () => {
  it('shares one group uuid and the task count', () => {
    const group = createGroup(
      createSignature({ uuid: 't1', name: 'thumb' }),
      createSignature({ uuid: 't2', name: 'thumb' }),
    );

    expect(group.groupUUID).toMatch(/^group_/);
    for (const task of group.tasks) {
      expect(task.groupUUID).toBe(group.groupUUID);
      expect(task.groupTaskCount).toBe(2);
    }
  });

  it('lists member uuids in order', () => {
    const group = createGroup(
      createSignature({ uuid: 't2', name: 'a' }),
      createSignature({ uuid: 't1', name: 'b' }),
    );
    expect(getGroupUUIDs(group)).toEqual(['t2', 't1']);
  });
});

describe('createChord', () => {
  it('points every member at the callback', () => {
    const group = createGroup(
      createSignature({ uuid: 't1', name: 'thumb' }),
      createSignature({ uuid: 't2', name: 'thumb' }),
    );
    const callback = createSignature({ uuid: 'cb-1', name: 'collect' });

    const chord = createChord(group, callback);

    expect(chord.callback).toBe(callback);
    expect(group.tasks.map((task) => task.chordCallback)).toEqual([
      callback,
      callback,
    ]);
  });

  it('rejects an empty group', () => {
    expect(() =>
      createChord(
        { groupUUID: 'g-1', tasks: [] },
        createSignature({ name: 'collect' }),
      ),
    ).toThrow(BridgeError);
  });
});
