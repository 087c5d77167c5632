/**
 * @fileoverview Construction and validation of task signatures.
 * @module src/tasks/signature
 */
import { z } from 'zod';

import { BridgeError, BridgeErrorCode } from '../types-global/errors.js';
import { generateUUID } from '../utils/security/idGenerator.js';
import type { Signature, TaskArg } from './types.js';

const TaskArgSchema = z.object({
  name: z.string().optional(),
  type: z.string().min(1, 'Argument type cannot be empty.'),
  value: z.unknown(),
});

/**
 * Input accepted by {@link createSignature}. Everything except `name` is
 * optional; `uuid` is generated when missing.
 */
export const SignatureInputSchema = z.object({
  uuid: z.string().min(1).optional(),
  name: z.string().trim().min(1, 'Task name cannot be empty.'),
  routingKey: z.string().optional(),
  eta: z.coerce.date().optional(),
  args: z.array(TaskArgSchema).default([]),
  headers: z.record(z.string(), z.unknown()).optional(),
  priority: z.number().int().min(0).optional(),
  immutable: z.boolean().optional(),
  retryCount: z.number().int().min(0).optional(),
  retryTimeout: z.number().int().min(0).optional(),
  ignoreWhenTaskNotRegistered: z.boolean().optional(),
});

export type SignatureInput = z.input<typeof SignatureInputSchema>;

/**
 * Generates a task UUID in the `task_<uuid>` form workers expect.
 */
export const generateTaskUUID = (): string => `task_${generateUUID()}`;

/**
 * Builds a validated {@link Signature}.
 * @throws {BridgeError} `ValidationError` when the input is invalid.
 */
export function createSignature(input: SignatureInput): Signature {
  const parsed = SignatureInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new BridgeError(
      BridgeErrorCode.ValidationError,
      'Invalid task signature.',
      { validationErrors: parsed.error.flatten().fieldErrors },
    );
  }

  const { uuid, args, headers, ...rest } = parsed.data;
  const taskArgs: TaskArg[] = args.map((arg) => ({
    ...(arg.name !== undefined ? { name: arg.name } : {}),
    type: arg.type,
    value: arg.value,
  }));
  const signature: Signature = {
    ...rest,
    uuid: uuid ?? generateTaskUUID(),
    args: taskArgs,
  };
  if (headers) {
    signature.headers = { ...headers };
  }
  return signature;
}

/**
 * Returns a copy of `signature` whose `headers` object is its own, so
 * stamping the copy leaves the original untouched. Nested signatures are
 * shared.
 */
export function copySignature(signature: Signature): Signature {
  const { headers, args, ...rest } = signature;
  const copy: Signature = { ...rest, args: [...args] };
  if (headers) {
    copy.headers = { ...headers };
  }
  return copy;
}
