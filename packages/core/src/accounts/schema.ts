import { z } from 'zod';
import { CompileError } from '../errors.js';
import { LINE_BREAK_RE, VALID_UNIT_KEY_RE } from './normalize.js';
import type { RawAccount } from './types.js';

const unitScalarSchema = z.union([
  z.string().refine(value => !LINE_BREAK_RE.test(value), 'Unit values must not contain line breaks'),
  z.number(),
  z.boolean(),
]);

const unitKeySchema = z.string().regex(VALID_UNIT_KEY_RE, 'Unit section names and keys must be letters, digits, - or _');

const unitSectionsSchema = z.record(
  unitKeySchema,
  z.record(unitKeySchema, z.union([unitScalarSchema, z.array(unitScalarSchema)])),
);

// Fields whose absence has its own error code stay optional here; normalizeAccount reports them.
const accountEntrySchema = z.object({
  enabled: z.boolean().optional(),
  mailboxes: z.array(z.string()).optional(),
  imap: z
    .object({
      host: z.string().nullish(),
      port: z.number().nullish(),
    })
    .nullish(),
  maildirAbsPath: z.string().nullish(),
  userName: z.string().nullish(),
  passwordCommand: z.union([z.string(), z.array(z.string())]).nullish(),
  service: z
    .object({
      name: z.string().nullish(),
      intervalSec: z.number().nullish(),
      extraConfig: unitSectionsSchema.optional(),
    })
    .nullish(),
});

export const registrySchema = z.object({
  accounts: z.record(z.string(), accountEntrySchema),
});

export type RegistryDocument = z.infer<typeof registrySchema>;

/**
 * Check the structure of a registry document (`{ accounts: { <name>: {...} } }`)
 * and flatten it into entries carrying their own name.
 */
export function parseRegistry(data: unknown): RawAccount[] {
  const result = registrySchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.map(String);
    const inAccount = path[0] === 'accounts' && path.length > 1;
    throw new CompileError(
      'InvalidRegistry',
      `Invalid account registry at ${path.join('.') || '<root>'}: ${issue.message}`,
      {
        account: inAccount ? path[1] : null,
        field: inAccount && path.length > 2 ? path.slice(2).join('.') : null,
      },
    );
  }

  return Object.entries(result.data.accounts).map(([name, entry]) => ({ name, ...entry }));
}
