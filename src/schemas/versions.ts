/**
 * Schema Version Registry
 *
 * All persisted schemas include a schemaVersion field. Each schema type has
 * an independent version number (simple integers).
 */

/**
 * Current schema versions for all data types.
 * Increment when making breaking changes to a schema.
 */
export const SCHEMA_VERSIONS = {
  /** Checkpointed run state */
  runState: 1,
  /** Run configuration file */
  runConfig: 1,
  /** Output artifact manifest */
  manifest: 1,
} as const;

/**
 * All schema types that support versioning
 */
export type SchemaType = keyof typeof SCHEMA_VERSIONS;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read the schema version of raw data; data without one is version 1.
 */
function readSchemaVersion(data: unknown): number {
  const version = isRecord(data) ? data.schemaVersion : undefined;
  return typeof version === 'number' && Number.isInteger(version) && version > 0 ? version : 1;
}

/**
 * Gate raw data on its schema version before it is parsed.
 *
 * Older data is stamped with the current version; every version so far
 * only added optional fields. Non-object data is returned unchanged for
 * the caller's schema to reject.
 *
 * @throws Error if the data was written by a newer version
 */
export function acceptSchemaVersion(data: unknown, schemaType: SchemaType): unknown {
  const current = SCHEMA_VERSIONS[schemaType];
  const version = readSchemaVersion(data);

  if (version > current) {
    throw new Error(
      `${schemaType} schema version ${version} is newer than supported version ${current}`
    );
  }

  return isRecord(data) ? { ...data, schemaVersion: current } : data;
}
