/**
 * @fileoverview Task descriptors exchanged with the broker: single task
 * signatures and the chain/group/chord workflows built from them.
 * @module src/tasks/types
 */

/**
 * Flat metadata mapping carried with a task message. Values are
 * application-defined; trace propagation only ever reads and writes string
 * entries.
 */
export type Headers = Record<string, unknown>;

/**
 * A single positional argument passed to a task.
 */
export interface TaskArg {
  name?: string;
  /** Wire type tag understood by the worker (e.g. `string`, `int64`). */
  type: string;
  value: unknown;
}

/**
 * Descriptor of one task invocation.
 */
export interface Signature {
  uuid: string;
  name: string;
  routingKey?: string;
  /** Earliest time the task may run. */
  eta?: Date;
  groupUUID?: string;
  groupTaskCount?: number;
  args: TaskArg[];
  headers?: Headers;
  priority?: number;
  /** When true, results of the previous task are not appended to `args`. */
  immutable?: boolean;
  retryCount?: number;
  /** Seconds to wait before the next retry. */
  retryTimeout?: number;
  onSuccess?: Signature[];
  onError?: Signature[];
  chordCallback?: Signature;
  ignoreWhenTaskNotRegistered?: boolean;
}

/**
 * Tasks executed one after another, each triggered by the previous one's
 * success.
 */
export interface Chain {
  tasks: Signature[];
}

/**
 * Tasks executed in parallel under a shared group UUID.
 */
export interface Group {
  groupUUID: string;
  tasks: Signature[];
}

/**
 * A group whose completion triggers a callback task.
 */
export interface Chord {
  group: Group;
  callback: Signature;
}
