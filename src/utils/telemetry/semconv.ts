/**
 * @fileoverview Span attribute keys written by the bridge. Kept local so the
 * key set stays stable regardless of the installed
 * `@opentelemetry/semantic-conventions` version.
 * @module src/utils/telemetry/semconv
 */

/**
 * Name of the library or framework that produced the span.
 */
export const ATTR_COMPONENT = 'component';

/**
 * Single task (signature) attributes.
 */
export const ATTR_SIGNATURE_NAME = 'signature.name';
export const ATTR_SIGNATURE_UUID = 'signature.uuid';
export const ATTR_SIGNATURE_GROUP_UUID = 'signature.group.uuid';
export const ATTR_SIGNATURE_CHORD_CALLBACK_UUID =
  'signature.chord.callback.uuid';
export const ATTR_SIGNATURE_CHORD_CALLBACK_NAME =
  'signature.chord.callback.name';

/**
 * Chain attributes.
 */
export const ATTR_CHAIN_TASKS_LENGTH = 'chain.tasks.length';

/**
 * Group attributes. `group.tasks` holds the member UUIDs, JSON-encoded when
 * possible and as a string array otherwise.
 */
export const ATTR_GROUP_UUID = 'group.uuid';
export const ATTR_GROUP_TASKS = 'group.tasks';
export const ATTR_GROUP_TASKS_LENGTH = 'group.tasks.length';
export const ATTR_GROUP_CONCURRENCY = 'group.concurrency';

/**
 * Chord attributes.
 */
export const ATTR_CHORD_CALLBACK_UUID = 'chord.callback.uuid';
