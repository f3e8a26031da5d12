/**
 * Provision Command
 *
 * Loads config and catalog, runs (or plans) the provisioning, prints the
 * summary and returns the process exit code.
 *
 * Exit codes: 0 all tools present, 1 a tool failed, 2 fatal error before
 * anything was installed.
 */

import { loadCatalog } from '../catalog/index.js';
import { createEnvironment } from '../provision/environment.js';
import type { EnvironmentOverrides } from '../provision/environment.js';
import { errorMessage, isFatalError } from '../provision/errors.js';
import { plan, run } from '../provision/orchestrator.js';
import { loadConfig, resolveSettings } from '../utils/config-helpers.js';
import { EXIT_FATAL, EXIT_SUCCESS, EXIT_TOOL_FAILED } from '../types/index.js';
import type { ProvisionOptions } from '../types/index.js';
import { formatPlan, formatRunSummary } from './summary.js';

export interface ProvisionDeps extends EnvironmentOverrides {
  signal?: AbortSignal;
  silent?: boolean;
}

export async function provision(options: ProvisionOptions = {}, deps: ProvisionDeps = {}): Promise<number> {
  const rootDir = options.rootDir ?? process.cwd();

  try {
    const config = loadConfig(rootDir, options.config);
    const settings = resolveSettings(options, config);
    const specs = loadCatalog(settings.catalogPath);
    const environment = createEnvironment(settings, deps);

    if (options.dryRun) {
      const planned = await plan(specs, environment, settings);
      console.log(formatPlan(planned));
      return EXIT_SUCCESS;
    }

    const report = await run(specs, environment, {
      only: settings.only,
      skip: settings.skip,
      timeoutMs: settings.timeoutMs,
      signal: deps.signal,
      silent: deps.silent,
    });

    console.log('\n' + formatRunSummary(report));
    return report.success ? EXIT_SUCCESS : EXIT_TOOL_FAILED;
  } catch (e) {
    if (isFatalError(e)) {
      console.error('❌ ' + e.message);
      return EXIT_FATAL;
    }
    console.error('❌ Unexpected error: ' + errorMessage(e));
    return EXIT_FATAL;
  }
}
