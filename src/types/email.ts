import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { SchemaViolationError } from '../utils/errors';

// Field order here is the column order of every export.
export const emailFieldNames = ['date', 'sender', 'subject', 'preview', 'body'] as const;

export type EmailField = (typeof emailFieldNames)[number];

const fieldDescriptions: Record<EmailField, string> = {
  date: 'The email date, in yyyy-mm-dd format when it can be determined.',
  sender: "The sender's name and/or email address.",
  subject: 'The email subject line.',
  preview: 'The preview text that would appear in an email client.',
  body: 'The full email content with line breaks preserved.',
};

export const emailRecordSchema = z.object({
  date: z.string().optional().describe(fieldDescriptions.date),
  sender: z.string().optional().describe(fieldDescriptions.sender),
  subject: z.string().optional().describe(fieldDescriptions.subject),
  preview: z.string().optional().describe(fieldDescriptions.preview),
  body: z.string().optional().describe(fieldDescriptions.body),
});

// What the model is asked for. A field it cannot fill may come back as null.
const responseField = (name: EmailField) => z.string().nullish().describe(fieldDescriptions[name]);

const responseRecordSchema = z.object({
  date: responseField('date'),
  sender: responseField('sender'),
  subject: responseField('subject'),
  preview: responseField('preview'),
  body: responseField('body'),
});

// Structured-object providers want an object at the root, so the list is wrapped.
export const emailCollectionSchema = z.object({
  emails: z.array(responseRecordSchema).describe('Every email found in the text, in the order it appears.'),
});

export type EmailRecord = z.infer<typeof emailRecordSchema>;

export type EmailCollection = readonly EmailRecord[];

export interface EmailSnapshot {
  emails: EmailCollection;
  /** Raw model text received so far. */
  rawText: string;
  /** True only on the terminal snapshot. */
  done: boolean;
}

export const emailFieldDescriptions = (): Array<{ name: EmailField; description: string }> =>
  emailFieldNames.map((name) => ({ name, description: fieldDescriptions[name] }));

export const emailJsonSchema = (): object => zodToJsonSchema(emailCollectionSchema);

// Lenient variant used on streamed output: missing records and fields are
// allowed, anything of the wrong type is not.
const lenientRecordSchema = z.preprocess((value) => value ?? {}, responseRecordSchema);

const lenientCollectionSchema = z.preprocess(
  (value) => value ?? {},
  z.object({
    emails: z.array(lenientRecordSchema).default([]),
  }),
);

type LenientRecord = z.infer<typeof lenientRecordSchema>;

const compactRecord = (record: LenientRecord): EmailRecord => {
  const compact: EmailRecord = {};
  for (const field of emailFieldNames) {
    const value = record[field];
    if (typeof value === 'string') {
      compact[field] = value;
    }
  }
  return compact;
};

/**
 * Best-effort parse of a (possibly incomplete) model object into an
 * EmailCollection. Missing pieces are tolerated; type mismatches throw
 * SchemaViolationError.
 */
export const parsePartialCollection = (candidate: unknown): EmailRecord[] => {
  const result = lenientCollectionSchema.safeParse(candidate);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.length > 0 ? issue.path.join('.') : 'root';
    throw new SchemaViolationError(`${path}: ${issue.message}`, { path, cause: result.error });
  }
  return result.data.emails.map(compactRecord);
};

const mergeRecord = (previous: EmailRecord | undefined, next: EmailRecord | undefined): EmailRecord => {
  const merged: EmailRecord = {};
  for (const field of emailFieldNames) {
    const earlier = previous?.[field];
    const later = next?.[field];
    // last write wins, but a field never goes back to empty
    const value = later === undefined || (later === '' && earlier) ? earlier : later;
    if (value !== undefined) {
      merged[field] = value;
    }
  }
  return merged;
};

/**
 * Folds a newer snapshot into the previous one. Records keep their index and
 * populated fields are never dropped.
 */
export const mergeCollections = (previous: EmailCollection, next: EmailCollection): EmailRecord[] => {
  const length = Math.max(previous.length, next.length);
  const merged: EmailRecord[] = [];
  for (let i = 0; i < length; i++) {
    merged.push(mergeRecord(previous[i], next[i]));
  }
  return merged;
};

export const sameCollection = (a: EmailCollection, b: EmailCollection): boolean =>
  a.length === b.length &&
  a.every((record, i) => emailFieldNames.every((field) => record[field] === b[i][field]));

export const freezeCollection = (emails: EmailCollection): EmailCollection =>
  Object.freeze(emails.map((record) => Object.freeze({ ...record })));
