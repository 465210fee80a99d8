/**
 * Artifact Validator
 *
 * Decides whether a stage that exited 0 actually produced its outputs.
 * Tools in this workflow are known to exit 0 after writing nothing (or a
 * header and nothing else), so an exit code alone never marks success.
 *
 * @module pipeline/validator
 */

import type { ValidationOutcome } from '../schemas/run-state.js';
import { MissingInputError } from '../errors.js';
import {
  OK,
  checkArtifact,
  checkBamRecords,
  checkDelimitedHeader,
  checkFastqRecords,
  checkIndexNewerThan,
} from './checks.js';
import type { ArtifactRef, ArtifactTable, StageDescriptor, ValidationRule } from './types.js';

/**
 * Human-readable one-liner for a failed outcome.
 */
export function describeValidationOutcome(outcome: ValidationOutcome): string {
  switch (outcome.kind) {
    case 'ok':
      return 'all outputs valid';
    case 'missing-artifact':
      return `output "${outcome.artifact}" was not produced (${outcome.path})`;
    case 'empty-artifact':
      return `output "${outcome.artifact}" is empty (${outcome.path})`;
    case 'format-error':
      return `output "${outcome.artifact}" is malformed: ${outcome.detail} (${outcome.path})`;
  }
}

export class ArtifactValidator {
  constructor(private readonly artifacts: ArtifactTable) {}

  private ref(name: string): ArtifactRef {
    const ref = this.artifacts.get(name);
    if (ref === undefined) {
      throw new Error(`Unknown artifact: ${name}`);
    }
    return ref;
  }

  /**
   * Check every declared output of `stage`, then its stage-specific rules.
   * Returns the first failure found.
   */
  async validate(stage: StageDescriptor): Promise<ValidationOutcome> {
    for (const output of stage.outputs) {
      const outcome = await checkArtifact(this.ref(output.name));
      if (outcome.kind !== 'ok') {
        return outcome;
      }
    }

    for (const rule of stage.validation) {
      const outcome = await this.applyRule(rule);
      if (outcome.kind !== 'ok') {
        return outcome;
      }
    }

    return OK;
  }

  /**
   * Verify every declared input exists with the right kind.
   *
   * @throws MissingInputError for the first input that does not
   */
  async checkInputs(stage: StageDescriptor): Promise<void> {
    for (const input of stage.inputs) {
      const ref = this.ref(input);
      const outcome = await checkArtifact(ref);
      if (outcome.kind === 'missing-artifact' || outcome.kind === 'format-error') {
        throw new MissingInputError(stage.name, input, ref.path);
      }
    }
  }

  private applyRule(rule: ValidationRule): Promise<ValidationOutcome> {
    const ref = this.ref(rule.artifact);
    switch (rule.check) {
      case 'bam-records':
        return checkBamRecords(ref);
      case 'fastq-records':
        return checkFastqRecords(ref, rule.minRecords);
      case 'index-newer-than':
        return checkIndexNewerThan(ref, this.ref(rule.target));
      case 'delimited-header':
        return checkDelimitedHeader(ref, rule);
    }
  }
}
