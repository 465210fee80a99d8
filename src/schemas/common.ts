/**
 * Common Zod Schemas - Shared types used across the pipeline
 */

import { z } from 'zod';

// ============================================
// ISO8601 Timestamp Schema
// ============================================

/**
 * ISO8601 timestamp string (e.g., "2024-01-15T10:30:00.000Z")
 */
export const ISO8601TimestampSchema = z.string().datetime({ message: 'Must be a valid ISO8601 timestamp' });

export type ISO8601Timestamp = z.infer<typeof ISO8601TimestampSchema>;

// ============================================
// Identifier Schemas
// ============================================

/**
 * Run identifiers become directory names, so they are restricted to a
 * filesystem-safe alphabet.
 */
export const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const RunIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(RUN_ID_PATTERN, 'Run ID may contain only letters, digits, ".", "_" and "-"')
  .refine((id) => !id.includes('..'), 'Run ID must not contain ".."');

/**
 * Stage names are kebab-case (e.g. "realign-signal").
 */
export const STAGE_NAME_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

export const StageNameSchema = z
  .string()
  .regex(STAGE_NAME_PATTERN, 'Stage name must be kebab-case (e.g. "realign-signal")');

/**
 * Artifact and context identifiers are snake/kebab tokens usable inside
 * `{placeholder}` command templates.
 */
export const IDENTIFIER_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

export const IdentifierSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, 'Identifier must start with a letter and use only letters, digits, "_" or "-"');
