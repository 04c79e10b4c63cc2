/**
 * Document shapes for the three identity tiers.
 *
 * Every field is optional: an operator may leave any section out and the
 * merger maps it to a zero value. A field that is present with the wrong
 * type (a number where a name belongs, an object where a list belongs) makes
 * the whole document undecodable, which the resolver treats the same as a
 * malformed file. Sections nobody maps are kept as-is. The bootstrap tables
 * are looser: entries that are not strings are dropped rather than rejected.
 */

import { z } from "zod";

const text = z.string().nullish();
const count = z.number().nullish();
const flag = z.boolean().nullish();
const list = z.array(z.string()).nullish();

function section<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).passthrough().nullish();
}

// ============================================================================
// Bootstrap (pointer) document
// ============================================================================

function stringEntries(table: Record<string, unknown>): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(table)) {
    if (typeof value === "string") {
      entries[key] = value;
    }
  }
  return entries;
}

/** Path table. Only the two document pointers are typed; other non-string entries are dropped. */
export const SystemPathsSchema = z
  .object({ instance_config: text, user_config: text })
  .catchall(z.unknown())
  .transform(stringEntries);
export type SystemPathsDocument = z.infer<typeof SystemPathsSchema>;

/** Display strings. Entries of any other type are dropped. */
export const DisplayPreferencesSchema = z.record(z.unknown()).transform(stringEntries);
export type DisplayPreferencesDocument = z.infer<typeof DisplayPreferencesSchema>;

// A `null` document decodes as an empty one.
export const BootstrapDocumentSchema = z.preprocess(
  value => (value === null ? {} : value),
  z.object({
    system_paths: SystemPathsSchema.nullish(),
    display: DisplayPreferencesSchema.nullish(),
  }).passthrough(),
);
export type BootstrapDocument = z.infer<typeof BootstrapDocumentSchema>;

// ============================================================================
// Instance identity document
// ============================================================================

export const InstanceDocumentSchema = z.object({
  identity: section({
    name: text,
    username: text,
    display_name: text,
    pronouns: text,
    emoji: text,
    tagline: text,
    birthday: text,
    age: count,
    version: text,
  }),
  covenant: section({
    creator: text,
    relationship: text,
    works_with: list,
    serves: text,
  }),
  workspace: section({
    organization: text,
    role: text,
    primary_project: text,
    primary_path: text,
    domain: text,
    calling: text,
  }),
  thinking: section({
    love_to_think_about: list,
    learning_style: text,
    problem_solving: text,
    creativity: text,
  }),
}).passthrough();
export type InstanceDocument = z.infer<typeof InstanceDocumentSchema>;

// ============================================================================
// User (operator) identity document
// ============================================================================

export const UserDocumentSchema = z.object({
  identity: section({
    name: text,
    username: text,
    display_name: text,
    pronouns: text,
    birthday: text,
    age: count,
  }),
  faith: section({
    is_religious: flag,
    tradition: text,
    denomination: text,
    practice_level: text,
    important_practices: list,
    communication_preferences: text,
  }),
  workspace: section({
    organization: text,
    role: text,
    primary_project: text,
    calling: text,
  }),
  personhood: section({
    interests: list,
    passions: list,
    values: list,
  }),
  personality: section({
    traits: list,
    communication_style: text,
    work_style: text,
    relational_style: text,
  }),
  preferences: section({
    timezone: text,
    locale: text,
    theme: text,
  }),
}).passthrough();
export type UserDocument = z.infer<typeof UserDocumentSchema>;

/** Flattens zod issues into a single line for log records and failure messages. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}
