/**
 * Runtime Context Resolver
 *
 * Maps a (context id, tool) pair to an execution plan: the absolute
 * executable path plus the environment the child must see. Conda contexts
 * get a PATH stripped of every other declared conda prefix, so two
 * environments are never visible to a child at the same time.
 *
 * Activation is tracked separately by {@link ContextActivations}, which
 * enforces the conflict relation while a command is running.
 *
 * @module runtime/contexts
 */

import { constants as fsConstants } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { CondaContext, RuntimeContext } from '../schemas/run-config.js';
import {
  ConfigurationError,
  ContextConflictError,
  ContextNotFoundError,
  ExecutableNotFoundError,
} from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Everything needed to spawn one command in one context.
 */
export interface ExecutionPlan {
  contextId: string;
  tool: string;
  executablePath: string;
  env: Record<string, string>;
  cwd: string;
}

/**
 * Read-only view of the contexts a resolver knows about.
 */
export interface ContextCatalog {
  get(contextId: string): RuntimeContext;
  conflictsOf(contextId: string): ReadonlySet<string>;
}

export interface ContextResolverOptions {
  contexts: RuntimeContext[];

  /** Explicit executable per tool; absolute/relative paths or bare names */
  executables?: Record<string, string>;

  /** Working directory for spawned commands */
  cwd: string;

  /** Parent environment, defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
}

/** Variables describing the parent's own conda activation */
const CONDA_ACTIVATION_VARS = [
  'CONDA_PREFIX',
  'CONDA_DEFAULT_ENV',
  'CONDA_PROMPT_MODIFIER',
  'CONDA_SHLVL',
] as const;

// ============================================================================
// Helpers
// ============================================================================

function condaEnvName(context: CondaContext): string {
  return context.envName ?? path.basename(context.prefix.replace(/\/+$/, ''));
}

function normalizeDir(dir: string): string {
  return path.resolve(dir).replace(/\/+$/, '');
}

function splitPath(value: string | undefined): string[] {
  return (value ?? '').split(path.delimiter).filter((entry) => entry.length > 0);
}

function copyEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find which declared contexts the current process was launched inside.
 *
 * A parent shell with an activated conda environment exports CONDA_PREFIX
 * and CONDA_DEFAULT_ENV; a declared conda context matching either counts as
 * already active.
 */
export function detectInheritedContexts(
  contexts: readonly RuntimeContext[],
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const activePrefix = env.CONDA_PREFIX ? normalizeDir(env.CONDA_PREFIX) : undefined;
  const activeName = env.CONDA_DEFAULT_ENV;

  return contexts
    .filter((context): context is CondaContext => context.kind === 'conda')
    .filter(
      (context) =>
        (activePrefix !== undefined && normalizeDir(context.prefix) === activePrefix) ||
        (activeName !== undefined && condaEnvName(context) === activeName)
    )
    .map((context) => context.id);
}

// ============================================================================
// Activations
// ============================================================================

/**
 * Stack of currently active contexts.
 *
 * Inherited contexts (the environment the orchestrator itself runs in) sit
 * at the bottom and are never popped. Activating a context that conflicts
 * with anything on the stack fails.
 */
export class ContextActivations {
  private readonly stack: string[];
  private readonly inheritedCount: number;

  constructor(
    private readonly catalog: Pick<ContextCatalog, 'conflictsOf'>,
    inherited: readonly string[] = []
  ) {
    this.stack = [...inherited];
    this.inheritedCount = inherited.length;
  }

  /** Active contexts, innermost last */
  active(): readonly string[] {
    return [...this.stack];
  }

  /** Contexts the process was launched inside */
  inherited(): readonly string[] {
    return this.stack.slice(0, this.inheritedCount);
  }

  /**
   * Throw if `contextId` conflicts with any active context.
   */
  assertCompatible(contextId: string): void {
    const conflicts = this.catalog.conflictsOf(contextId);
    const clash = this.stack.find((active) => active !== contextId && conflicts.has(active));
    if (clash !== undefined) {
      throw new ContextConflictError(contextId, clash);
    }
  }

  /**
   * Push a context and return a release function that restores the stack
   * to its previous depth. Calling release more than once is a no-op.
   */
  activate(contextId: string): () => void {
    this.assertCompatible(contextId);
    const depth = this.stack.length;
    this.stack.push(contextId);

    let released = false;
    return () => {
      if (!released) {
        released = true;
        this.stack.length = Math.max(depth, this.inheritedCount);
      }
    };
  }

  /**
   * Run `fn` with `contextId` active; the previous context is restored
   * whether `fn` resolves or throws.
   */
  async withContext<T>(contextId: string, fn: () => Promise<T>): Promise<T> {
    const release = this.activate(contextId);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

// ============================================================================
// Resolver
// ============================================================================

export class ContextResolver implements ContextCatalog {
  private readonly contexts = new Map<string, RuntimeContext>();
  private readonly conflicts = new Map<string, Set<string>>();
  private readonly executables: Record<string, string>;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly cwd: string;

  /** Activation stack shared with the process runner */
  readonly activations: ContextActivations;

  constructor(options: ContextResolverOptions) {
    this.executables = options.executables ?? {};
    this.baseEnv = options.baseEnv ?? process.env;
    this.cwd = options.cwd;

    for (const context of options.contexts) {
      if (this.contexts.has(context.id)) {
        throw new ConfigurationError(
          `Runtime context "${context.id}" is declared more than once`,
          'CONTEXT_DUPLICATE'
        );
      }
      this.contexts.set(context.id, context);
      this.conflicts.set(context.id, new Set());
    }

    // The conflict relation is symmetric regardless of which side declared it.
    for (const context of options.contexts) {
      for (const other of context.conflictsWith) {
        const otherConflicts = this.conflicts.get(other);
        if (otherConflicts === undefined) {
          throw new ConfigurationError(
            `Runtime context "${context.id}" declares a conflict with unknown context "${other}"`,
            'CONTEXT_NOT_FOUND'
          );
        }
        if (other === context.id) {
          throw new ConfigurationError(
            `Runtime context "${context.id}" cannot conflict with itself`,
            'CONTEXT_CONFLICT'
          );
        }
        this.conflicts.get(context.id)?.add(other);
        otherConflicts.add(context.id);
      }
    }

    this.activations = new ContextActivations(
      this,
      detectInheritedContexts(options.contexts, this.baseEnv)
    );
  }

  has(contextId: string): boolean {
    return this.contexts.has(contextId);
  }

  get(contextId: string): RuntimeContext {
    const context = this.contexts.get(contextId);
    if (context === undefined) {
      throw new ContextNotFoundError(contextId);
    }
    return context;
  }

  ids(): string[] {
    return [...this.contexts.keys()];
  }

  conflictsOf(contextId: string): ReadonlySet<string> {
    const conflicts = this.conflicts.get(contextId);
    if (conflicts === undefined) {
      throw new ContextNotFoundError(contextId);
    }
    return conflicts;
  }

  /**
   * Produce the execution plan for `tool` inside `contextId`.
   *
   * @throws ContextNotFoundError, ContextConflictError, ExecutableNotFoundError
   */
  async resolve(contextId: string, tool: string): Promise<ExecutionPlan> {
    const context = this.get(contextId);
    this.activations.assertCompatible(contextId);

    const env = this.buildEnvironment(context);
    const executablePath = await this.locateExecutable(tool, context, env);

    return {
      contextId,
      tool,
      executablePath,
      env,
      cwd: this.cwd,
    };
  }

  /**
   * Environment for children of `context`.
   *
   * Starts from the parent environment, removes the parent's own conda
   * activation and every declared conda prefix that is not this context's,
   * then prepends search paths (and `<prefix>/bin` for conda).
   */
  buildEnvironment(context: RuntimeContext): Record<string, string> {
    const env = copyEnv(this.baseEnv);

    const foreignBins = new Set<string>();
    for (const other of this.contexts.values()) {
      if (other.kind === 'conda' && other.id !== context.id) {
        foreignBins.add(normalizeDir(path.join(other.prefix, 'bin')));
      }
    }
    if (env.CONDA_PREFIX) {
      const inheritedBin = normalizeDir(path.join(env.CONDA_PREFIX, 'bin'));
      const ownBin =
        context.kind === 'conda' ? normalizeDir(path.join(context.prefix, 'bin')) : undefined;
      if (inheritedBin !== ownBin) {
        foreignBins.add(inheritedBin);
      }
    }
    for (const name of CONDA_ACTIVATION_VARS) {
      delete env[name];
    }

    const inheritedPath = splitPath(env.PATH).filter(
      (entry) => !foreignBins.has(normalizeDir(entry))
    );
    const leading = context.searchPaths.map((dir) => path.resolve(this.cwd, dir));

    if (context.kind === 'conda') {
      leading.push(path.join(context.prefix, 'bin'));
      env.CONDA_PREFIX = context.prefix;
      env.CONDA_DEFAULT_ENV = condaEnvName(context);
      env.CONDA_AUTO_ACTIVATE_BASE = 'false';
    }

    const seen = new Set<string>();
    env.PATH = [...leading, ...inheritedPath]
      .filter((entry) => {
        if (seen.has(entry)) return false;
        seen.add(entry);
        return true;
      })
      .join(path.delimiter);

    return { ...env, ...context.env };
  }

  private async locateExecutable(
    tool: string,
    context: RuntimeContext,
    env: Record<string, string>
  ): Promise<string> {
    const configured = this.executables[tool];
    const name = configured ?? tool;

    if (name.includes('/')) {
      const candidate = path.resolve(this.cwd, name);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
      throw new ExecutableNotFoundError(tool, context.id, [candidate]);
    }

    const searched = splitPath(env.PATH);
    for (const dir of searched) {
      const candidate = path.join(dir, name);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
    throw new ExecutableNotFoundError(tool, context.id, searched);
  }
}
