import type { ConfigInput } from '@objstress/stresser';

export const VERSION = '0.1.0';

export const usage = (): string => {
  return `objstress [options] <manifest.txt>

Arguments:
  <manifest.txt>          Object keys, one per line. Read in 'read' and 'mixed' modes;
                          in 'write' mode generated keys are written here (see --genmf).

Options:
  --config <file>         JSON config file (lowest precedence after defaults)
  -d, --duration <dur>    Test duration, e.g. 30s, 5m, 1h (default 1m)
  -c, --concurrency <n>   Concurrent workers (default 10)
  -r, --randomize         Pick read keys at random instead of sequentially
  --op <type>             read | write | mixed (default read)
  --putsize <kb>          Object size in KB for write/mixed (default 1024)
  --files <n>             Write exactly <n> objects, then stop (write mode)
  --genmf[=true|false]    Record generated keys in the manifest (default true)
  -o, --output <file>     Detailed results CSV (default stress_results.csv)
  --log-level <level>     debug | info | warn | error (default info)
  --metrics-out <file>    Write Prometheus metrics after the run
  --version               Print the version and exit
  --help                  Print this help and exit

Configuration precedence: flags > environment > config file > defaults

Environment:
  AWS_ENDPOINT_URL, AWS_REGION, S3_BUCKET
  AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY (or the default credential chain)
  STRESSER_OPERATION_TYPE, STRESSER_PUT_SIZE_KB, STRESSER_FILE_COUNT
  STRESSER_INSECURE_SKIP_VERIFY, STRESSER_GENERATE_MANIFEST, STRESSER_LOG_LEVEL
`;
};

const ALIASES: Record<string, string> = {
  d: 'duration',
  c: 'concurrency',
  r: 'randomize',
  o: 'output',
};

const BOOLEAN_FLAGS = new Set(['randomize', 'genmf', 'version', 'help']);

export type ParsedArgs = {
  flags: Record<string, string>;
  positionals: string[];
};

/**
 * `--key value`, `--key=value`, `-k value` and bare boolean switches. Boolean switches
 * never consume the next token; `--no-<switch>` sets one to `false`.
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const flags: Record<string, string> = {};
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }
    if (!token.startsWith('-') || token === '-') {
      positionals.push(token);
      continue;
    }
    const body = token.startsWith('--') ? token.slice(2) : token.slice(1);
    const eq = body.indexOf('=');
    const rawKey = eq === -1 ? body : body.slice(0, eq);
    const key = token.startsWith('--') ? rawKey : (ALIASES[rawKey] ?? rawKey);

    if (eq !== -1) {
      flags[key] = body.slice(eq + 1);
      continue;
    }
    if (key.startsWith('no-') && BOOLEAN_FLAGS.has(key.slice(3))) {
      flags[key.slice(3)] = 'false';
      continue;
    }
    const value = args[i + 1];
    if (BOOLEAN_FLAGS.has(key) || value === undefined || value.startsWith('-')) {
      flags[key] = 'true';
    } else {
      flags[key] = value;
      i += 1;
    }
  }
  return { flags, positionals };
};

export type FlagConfig = {
  config: ConfigInput;
  errors: string[];
};

/** Translate parsed flags into a config layer; only flags that were given are set. */
export const buildFlagConfig = (parsed: ParsedArgs): FlagConfig => {
  const { flags } = parsed;
  const errors: string[] = [];

  const integer = (name: string): number | undefined => {
    const raw = flags[name];
    if (raw === undefined) {
      return undefined;
    }
    if (!/^-?\d+$/.test(raw.trim())) {
      errors.push(`--${name} expects an integer, got '${raw}'`);
      return undefined;
    }
    return Number.parseInt(raw, 10);
  };

  const bool = (name: string): boolean | undefined => {
    const raw = flags[name];
    if (raw === undefined) {
      return undefined;
    }
    if (raw === 'true' || raw === 'false') {
      return raw === 'true';
    }
    errors.push(`--${name} expects true or false, got '${raw}'`);
    return undefined;
  };

  if (parsed.positionals.length > 1) {
    errors.push(`expected exactly one manifest path, got extra arguments: ${parsed.positionals.slice(1).join(' ')}`);
  }

  const config: ConfigInput = {
    duration: flags.duration,
    concurrency: integer('concurrency'),
    randomize: bool('randomize'),
    operationType: flags.op,
    putSizeKB: integer('putsize'),
    fileCount: integer('files'),
    generateManifest: bool('genmf'),
    outputFile: flags.output,
    logLevel: flags['log-level']?.toLowerCase(),
    manifestPath: parsed.positionals[0],
  };
  return { config, errors };
};
