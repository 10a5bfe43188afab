import { writeFile } from 'node:fs/promises';
import {
  formatError,
  loadConfigFile,
  logError,
  logInfo,
  logWarn,
  readEnvConfig,
  renderMetrics,
  resolveConfig,
  runStressTest,
  setLogLevel,
  StressSetupError,
} from '@objstress/stresser';
import type { ConfigInput } from '@objstress/stresser';
import { buildFlagConfig, parseArgs, usage, VERSION } from './lib';
import { formatSummary, writeResultsCsv } from './report';

const loadFileLayer = async (filePath: string | undefined): Promise<ConfigInput | undefined> => {
  if (!filePath) {
    return undefined;
  }
  const layer = await loadConfigFile(filePath);
  logInfo(`[cli] loaded configuration from ${filePath}`);
  return layer;
};

const run = async (): Promise<number> => {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.flags.help === 'true') {
    console.log(usage());
    return 0;
  }
  if (parsed.flags.version === 'true') {
    console.log(`objstress ${VERSION} (node ${process.version})`);
    return 0;
  }

  const flagLayer = buildFlagConfig(parsed);
  if (flagLayer.errors.length > 0) {
    for (const message of flagLayer.errors) {
      console.error(message);
    }
    console.error(usage());
    return 1;
  }

  const env = readEnvConfig();
  for (const warning of env.warnings) {
    logWarn(`[cli] ${warning}`);
  }

  let fileLayer: ConfigInput | undefined;
  try {
    fileLayer = await loadFileLayer(parsed.flags.config);
  } catch (error) {
    const cause = error instanceof Error && error.cause !== undefined ? formatError(error.cause) : undefined;
    logError('[cli] configuration error', { error: formatError(error), cause });
    return 1;
  }

  const resolved = resolveConfig({ file: fileLayer, env: env.config, flags: flagLayer.config });
  if (!resolved.ok) {
    logError('[cli] invalid configuration', { errors: resolved.errors });
    if (!parsed.positionals[0]) {
      console.error(usage());
    }
    return 1;
  }
  const config = resolved.config;
  setLogLevel(config.logLevel);

  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals): void => {
    logWarn(`[cli] received ${signal}, stopping workers`);
    controller.abort(new Error(`interrupted by ${signal}`));
  };
  process.once('SIGINT', interrupt);
  process.once('SIGTERM', interrupt);

  let exitCode = 0;
  try {
    const outcome = await runStressTest(config, { signal: controller.signal });
    logInfo(`[cli] stress test ended: ${outcome.termination}`);
    process.stdout.write(formatSummary(outcome.stats));

    try {
      await writeResultsCsv(outcome.results, config.outputFile);
      console.log(`Detailed results written to ${config.outputFile}`);
    } catch (error) {
      logError('[cli] failed to write results csv', { error: formatError(error) });
    }

    const metricsOut = parsed.flags['metrics-out'];
    if (metricsOut) {
      try {
        await writeFile(metricsOut, await renderMetrics(), 'utf8');
        logInfo(`[cli] metrics written to ${metricsOut}`);
      } catch (error) {
        logError('[cli] failed to write metrics', { error: formatError(error) });
      }
    }

    if (outcome.error) {
      logError('[cli] stress test terminated unexpectedly', { error: formatError(outcome.error) });
      exitCode = 1;
    }
  } catch (error) {
    if (!(error instanceof StressSetupError)) {
      throw error;
    }
    logError('[cli] stress test setup failed', { error: error.message });
    exitCode = 1;
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
  }
  return exitCode;
};

run()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(formatError(error));
    process.exit(1);
  });
