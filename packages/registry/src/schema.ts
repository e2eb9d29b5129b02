/**
 * Persisted registry document
 *
 * {
 *   "version": 1,
 *   "applications": {
 *     "python": {
 *       "activeTag": "3.8",
 *       "entries": {
 *         "3.8": { "kind": "path", "sourcePath": "/usr/bin/python3.8", "fingerprint": "..." }
 *       }
 *     }
 *   }
 * }
 *
 * Unknown fields are stripped on read so older binswap versions can load
 * documents written by newer ones that only added fields.
 */

import { z } from 'zod';
import { isValidAppName, isValidTag } from './names.js';
import type { Registry } from './types.js';

export const REGISTRY_VERSION = 1;

/**
 * Reject a raw object with an own "__proto__" key before z.record copies it,
 * where the assignment would hit the prototype setter and drop the key
 */
function withoutProtoKey<T extends z.ZodTypeAny>(schema: T) {
  return z
    .unknown()
    .superRefine((raw, ctx) => {
      if (typeof raw === 'object' && raw !== null && Object.hasOwn(raw, '__proto__')) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['__proto__'], message: 'reserved key "__proto__"' });
      }
    })
    .pipe(schema);
}

const pathEntrySchema = z.object({
  kind: z.literal('path'),
  sourcePath: z.string().min(1),
  managedCopyPath: z.string().min(1).optional(),
  fingerprint: z.string().min(1),
  description: z.string().optional(),
});

const commandEntrySchema = z.object({
  kind: z.literal('command'),
  commandLine: z.string().trim().min(1),
  workingDirectory: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
  description: z.string().optional(),
});

export const entrySchema = z.discriminatedUnion('kind', [pathEntrySchema, commandEntrySchema]);

export const applicationSchema = z
  .object({
    entries: withoutProtoKey(z.record(entrySchema)),
    activeTag: z.string().optional(),
  })
  .superRefine((app, ctx) => {
    for (const tag of Object.keys(app.entries)) {
      if (!isValidTag(tag)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['entries', tag], message: `invalid tag "${tag}"` });
      }
    }
    if (app.activeTag !== undefined && !Object.hasOwn(app.entries, app.activeTag)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['activeTag'],
        message: `active tag "${app.activeTag}" has no entry`,
      });
    }
  });

export const registryDocumentSchema = z
  .object({
    version: z
      .number()
      .int()
      .positive()
      .max(REGISTRY_VERSION, { message: 'written by a newer binswap' })
      .default(REGISTRY_VERSION),
    applications: withoutProtoKey(z.record(applicationSchema)).default({}),
  })
  .superRefine((doc, ctx) => {
    for (const name of Object.keys(doc.applications)) {
      if (!isValidAppName(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['applications', name], message: `invalid application name "${name}"` });
      }
    }
  });

export type RegistryDocument = z.infer<typeof registryDocumentSchema>;

export function toDocument(registry: Registry): RegistryDocument {
  return { version: REGISTRY_VERSION, applications: registry.applications };
}

export function fromDocument(doc: RegistryDocument): Registry {
  return { applications: doc.applications };
}

/**
 * First validation issue as "path: message"
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid document';
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}
