/**
 * Orchestrator
 *
 * Detects the platform once, orders the tools, then installs them one at a
 * time. A failing tool is recorded and the run moves on; only tools that
 * depend on it are skipped.
 *
 * Installs never run concurrently: apt, dnf and pacman hold a lock on the
 * package database.
 */

import type {
  InstallResult,
  Outcome,
  PlannedStep,
  Platform,
  Result,
  RunReport,
  ToolSpec,
} from '../types/index.js';
import { describePlatform } from './platform.js';
import { resolveOrder, selectTools } from './registry.js';
import type { Selection } from './registry.js';
import { notApplicableReason } from './strategies/index.js';
import type { Installer } from './strategies/index.js';
import { fromThrown } from './strategies/outcome.js';
import { InstallError, errorMessage } from './errors.js';

/**
 * Host-facing collaborators of a run
 */
export interface ProvisionEnvironment {
  detect: () => Platform;
  installerFor: (spec: ToolSpec, platform: Platform) => Installer;
}

export interface RunOptions extends Selection {
  /** Per-tool limit; no limit when undefined */
  timeoutMs?: number;
  /** Aborting cancels the current tool and skips the rest */
  signal?: AbortSignal;
  silent?: boolean;
}

export interface Plan {
  platform: Platform;
  steps: PlannedStep[];
}

function createResult(
  tool: string,
  outcome: Outcome,
  startTime: number,
  extra: Pick<InstallResult, 'detail' | 'error'> = {}
): InstallResult {
  return Object.freeze({
    tool,
    outcome,
    ...extra,
    durationMs: Math.round(performance.now() - startTime),
  });
}

function failure(tool: string, startTime: number, error: InstallError): InstallResult {
  return createResult(tool, 'failed', startTime, {
    detail: error.message,
    error: { kind: error.kind, message: error.message },
  });
}

/**
 * First dependency in this run that did not end up present
 */
function blockedBy(spec: ToolSpec, outcomes: ReadonlyMap<string, Outcome>): string | null {
  for (const dep of spec.dependsOn) {
    const outcome = outcomes.get(dep);
    if (outcome === 'failed' || outcome === 'skipped') {
      return 'dependency ' + dep + (outcome === 'failed' ? ' failed' : ' was skipped');
    }
  }
  return null;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? ms + 'ms' : Math.round(ms / 1000) + 's';
}

/**
 * Per-tool timeout and run cancellation, shared by the check and the install
 */
interface ToolLimits {
  /** Run work unless a limit has already been hit; a limit hit first wins */
  within<T>(work: (signal: AbortSignal) => Promise<Result<T, InstallError>>): Promise<Result<T, InstallError>>;
  dispose(): void;
}

function createLimits(tool: string, options: RunOptions): ToolLimits {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onCancel: (() => void) | undefined;
  let hit: InstallError | undefined;

  const expired = new Promise<{ ok: false; error: InstallError }>((resolve) => {
    const stop = (error: InstallError): void => {
      if (hit) return;
      hit = error;
      resolve({ ok: false, error });
      controller.abort();
    };

    onCancel = () => stop(new InstallError('cancelled', 'Run cancelled while installing ' + tool));
    if (options.signal?.aborted) {
      onCancel();
    } else {
      options.signal?.addEventListener('abort', onCancel, { once: true });
    }

    if (options.timeoutMs !== undefined) {
      const limit = formatDuration(options.timeoutMs);
      timer = setTimeout(
        () => stop(new InstallError('timeout', 'TimeoutError: ' + tool + ' did not finish within ' + limit)),
        options.timeoutMs
      );
    }
  });

  return {
    async within<T>(
      work: (signal: AbortSignal) => Promise<Result<T, InstallError>>
    ): Promise<Result<T, InstallError>> {
      if (hit) return { ok: false, error: hit };
      return Promise.race([work(controller.signal), expired]);
    },
    dispose() {
      clearTimeout(timer);
      if (onCancel) options.signal?.removeEventListener('abort', onCancel);
    },
  };
}

function checkInstalled(installer: Installer): Promise<Result<boolean, InstallError>> {
  return installer.isInstalled().then(
    (present): Result<boolean, InstallError> => ({ ok: true, value: present }),
    (e: unknown): Result<boolean, InstallError> => ({
      ok: false,
      error: new InstallError('check', 'Install check failed: ' + errorMessage(e)),
    })
  );
}

function log(options: RunOptions, message: string): void {
  if (!options.silent) console.log(message);
}

/**
 * Detect, order, and install
 *
 * @throws UnsupportedPlatformError, CyclicDependencyError, CatalogError or
 *   UnknownToolError before anything is installed
 */
export async function run(
  specs: readonly ToolSpec[],
  environment: ProvisionEnvironment,
  options: RunOptions = {}
): Promise<RunReport> {
  const platform = environment.detect();
  const ordered = resolveOrder(selectTools(specs, options));

  log(options, '🔍 Provisioning ' + ordered.length + ' tools on ' + describePlatform(platform) + '\n');

  const results: InstallResult[] = [];
  const outcomes = new Map<string, Outcome>();

  const record = (result: InstallResult): void => {
    results.push(result);
    outcomes.set(result.tool, result.outcome);

    if (result.outcome === 'alreadyPresent') {
      log(options, '   ✅ ' + result.tool + ' already installed');
    } else if (result.outcome === 'installed') {
      log(options, '   ✅ Installed ' + result.tool);
    } else if (result.outcome === 'skipped') {
      log(options, '   ⏭️  Skipped ' + result.tool + ': ' + (result.detail ?? ''));
    } else {
      log(options, '   ❌ Failed: ' + result.tool + ': ' + (result.detail ?? ''));
    }
  };

  for (const spec of ordered) {
    const startTime = performance.now();

    if (options.signal?.aborted) {
      record(createResult(spec.name, 'skipped', startTime, { detail: 'run cancelled' }));
      continue;
    }

    const skipReason = blockedBy(spec, outcomes) ?? notApplicableReason(spec, platform);
    if (skipReason) {
      record(createResult(spec.name, 'skipped', startTime, { detail: skipReason }));
      continue;
    }

    const installer = environment.installerFor(spec, platform);
    const limits = createLimits(spec.name, options);

    try {
      const checked = await limits.within(() => checkInstalled(installer));
      if (!checked.ok) {
        record(failure(spec.name, startTime, checked.error));
        continue;
      }
      if (checked.value) {
        record(createResult(spec.name, 'alreadyPresent', startTime));
        continue;
      }

      log(options, '   📦 Installing ' + spec.name + ' (' + installer.describe() + ')...');
      const outcome = await limits.within((signal) =>
        installer.install(signal).catch((e: unknown) => fromThrown(e, 'nonZeroExit'))
      );

      record(outcome.ok ? createResult(spec.name, 'installed', startTime) : failure(spec.name, startTime, outcome.error));
    } finally {
      limits.dispose();
    }
  }

  return Object.freeze({
    platform,
    results: Object.freeze(results),
    success: results.every((result) => result.outcome !== 'failed'),
  });
}

/**
 * Work out what `run` would do without installing anything
 */
export async function plan(
  specs: readonly ToolSpec[],
  environment: ProvisionEnvironment,
  options: Selection = {}
): Promise<Plan> {
  const platform = environment.detect();
  const ordered = resolveOrder(selectTools(specs, options));

  const steps: PlannedStep[] = [];
  const skipped = new Set<string>();

  for (const spec of ordered) {
    const blocker = spec.dependsOn.find((dep) => skipped.has(dep));
    const skipReason = blocker
      ? 'dependency ' + blocker + ' was skipped'
      : notApplicableReason(spec, platform);

    if (skipReason) {
      skipped.add(spec.name);
      steps.push({ tool: spec.name, action: 'skip', detail: skipReason });
      continue;
    }

    const installer = environment.installerFor(spec, platform);
    let present: boolean;
    try {
      present = await installer.isInstalled();
    } catch (e) {
      skipped.add(spec.name);
      steps.push({ tool: spec.name, action: 'skip', detail: 'Install check failed: ' + errorMessage(e) });
      continue;
    }

    steps.push(
      present
        ? { tool: spec.name, action: 'alreadyPresent', detail: 'already installed' }
        : { tool: spec.name, action: 'install', detail: installer.describe() }
    );
  }

  return { platform, steps };
}
