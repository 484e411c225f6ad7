import { z } from 'zod';

// robot-server wraps every resource in a `data` envelope.

const resourceIdSchema = z.object({
  data: z.object({
    id: z.string().min(1),
  }),
});

const actionAckSchema = z.object({
  data: z.object({
    actionType: z.string(),
  }),
});

const runStateSchema = z.object({
  data: z
    .object({
      status: z.unknown(),
      errors: z.unknown(),
    })
    .passthrough(),
});

export type RunState = {
  /** `data.status` when it is a string, otherwise '' */
  status: string;
  /** `data.errors` exactly as returned; absent when the field is missing */
  errors?: unknown;
};

export function parseJsonMaybe(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** `data.id` of a created protocol or run, or undefined when absent or empty. */
export function parseResourceId(text: string): string | undefined {
  const parsed = resourceIdSchema.safeParse(parseJsonMaybe(text));
  return parsed.success ? parsed.data.data.id : undefined;
}

/** Echoed `data.actionType` of an action acknowledgment. */
export function parseActionAck(text: string): string | undefined {
  const parsed = actionAckSchema.safeParse(parseJsonMaybe(text));
  return parsed.success ? parsed.data.data.actionType : undefined;
}

/** Status and errors of a run, or undefined when the body has no `data` object. */
export function parseRunState(text: string): RunState | undefined {
  const json = parseJsonMaybe(text);
  const parsed = runStateSchema.safeParse(json);
  if (!parsed.success) return undefined;
  const data = parsed.data.data;
  const status = typeof data.status === 'string' ? data.status : '';
  return 'errors' in data && data.errors !== undefined ? { status, errors: data.errors } : { status };
}
