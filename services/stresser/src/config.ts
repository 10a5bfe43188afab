import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { tryParseDuration } from './duration';
import type { LogLevel } from './logging';
import { isLogLevel } from './logging';

export type OperationType = 'read' | 'write' | 'mixed';

export const OPERATION_TYPES: readonly OperationType[] = ['read', 'write', 'mixed'];

export type StresserConfig = {
  endpoint: string;
  region: string;
  bucket: string;
  accessKey?: string;
  secretKey?: string;
  insecureSkipVerify: boolean;
  /** Duration string such as `30s`, `5m` or `1h`. */
  duration: string;
  concurrency: number;
  randomize: boolean;
  manifestPath: string;
  outputFile: string;
  operationType: OperationType;
  putSizeKB: number;
  /** When set in write mode, exactly this many objects are written and the run ends. */
  fileCount?: number;
  generateManifest: boolean;
  logLevel: LogLevel;
};

export type ConfigInput = {
  [K in keyof StresserConfig]?: K extends 'operationType' | 'logLevel' ? string : StresserConfig[K];
};

export type ConfigValidation = { ok: true; config: StresserConfig } | { ok: false; errors: string[] };

export const DEFAULT_PUT_SIZE_KB = 1024;

export const defaultStresserConfig: ConfigInput = {
  region: 'us-east-1',
  insecureSkipVerify: false,
  duration: '1m',
  concurrency: 10,
  randomize: false,
  outputFile: 'stress_results.csv',
  operationType: 'read',
  putSizeKB: DEFAULT_PUT_SIZE_KB,
  fileCount: undefined,
  generateManifest: true,
  logLevel: 'info',
};

const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

const configSchema = z
  .object({
    endpoint: z
      .string({ required_error: 'endpoint URL is required (set via --config file or AWS_ENDPOINT_URL)' })
      .min(1, 'endpoint URL is required (set via --config file or AWS_ENDPOINT_URL)'),
    region: z.string().min(1),
    bucket: z
      .string({ required_error: 'bucket name is required (set via --config file or S3_BUCKET)' })
      .min(1, 'bucket name is required (set via --config file or S3_BUCKET)'),
    accessKey: z.string().optional(),
    secretKey: z.string().optional(),
    insecureSkipVerify: z.boolean(),
    duration: z.string().min(1, 'duration is required'),
    concurrency: z.number().int().positive('concurrency must be greater than 0'),
    randomize: z.boolean(),
    manifestPath: z
      .string({ required_error: 'manifest file path argument is required' })
      .min(1, 'manifest file path argument is required'),
    outputFile: z.string().min(1, 'output csv file path is required'),
    operationType: z
      .string()
      .trim()
      .toLowerCase()
      .pipe(
        z.enum(['read', 'write', 'mixed'], {
          errorMap: () => ({ message: "must be 'read', 'write', or 'mixed'" }),
        }),
      ),
    putSizeKB: z.number().int(),
    fileCount: z.number().int().positive('file count must be greater than 0').optional(),
    generateManifest: z.boolean(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  })
  .superRefine((value, ctx) => {
    const durationMs = tryParseDuration(value.duration);
    if (durationMs === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['duration'],
        message: `invalid duration format "${value.duration}"`,
      });
    } else if (durationMs <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['duration'], message: 'duration must be positive' });
    }
    if (value.operationType !== 'read' && value.putSizeKB <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['putSizeKB'],
        message: "put object size must be greater than 0 KB for 'write' or 'mixed' mode",
      });
    }
  });

const fileSchema = z
  .object({
    endpoint: z.string(),
    region: z.string(),
    bucket: z.string(),
    accessKey: z.string(),
    secretKey: z.string(),
    insecureSkipVerify: z.boolean(),
    duration: z.string(),
    concurrency: z.number(),
    randomize: z.boolean(),
    manifestPath: z.string(),
    outputFile: z.string(),
    operationType: z.string(),
    putSizeKB: z.number(),
    fileCount: z.number(),
    generateManifest: z.boolean(),
    logLevel: z.string(),
  })
  .partial()
  .strict();

export const validateConfig = (input: ConfigInput): ConfigValidation => {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, errors: toErrors(result.error.issues) };
  }
  return { ok: true, config: result.data };
};

/** Later layers win; `undefined` never overrides an earlier value. */
export const mergeConfig = (...layers: ConfigInput[]): ConfigInput => {
  const merged: ConfigInput = {};
  for (const layer of layers) {
    const defined = Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
    Object.assign(merged, defined);
  }
  return merged;
};

export const loadConfigFile = async (filePath: string): Promise<ConfigInput> => {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new Error(`failed to read config file ${filePath}`, { cause: error });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`failed to parse config file ${filePath}`, { cause: error });
  }
  const result = fileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`invalid config file ${filePath}: ${toErrors(result.error.issues).join('; ')}`);
  }
  return result.data;
};

const parsePositiveInt = (value: string): number | undefined => {
  if (!/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : undefined;
};

const parseBool = (value: string): boolean | undefined => {
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  return undefined;
};

export type EnvConfig = {
  config: ConfigInput;
  warnings: string[];
};

/** Reads the `AWS_*`, `S3_BUCKET` and `STRESSER_*` overrides. Unusable values are reported, not applied. */
export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const get = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value === '' ? undefined : value;
  };
  const warnings: string[] = [];
  const config: ConfigInput = {
    endpoint: get('AWS_ENDPOINT_URL'),
    region: get('AWS_REGION'),
    bucket: get('S3_BUCKET'),
    accessKey: get('AWS_ACCESS_KEY_ID'),
    secretKey: get('AWS_SECRET_ACCESS_KEY'),
    operationType: get('STRESSER_OPERATION_TYPE'),
  };

  const skipVerify = get('STRESSER_INSECURE_SKIP_VERIFY');
  if (skipVerify !== undefined) {
    config.insecureSkipVerify = parseBool(skipVerify);
    if (config.insecureSkipVerify === undefined) {
      warnings.push(`invalid STRESSER_INSECURE_SKIP_VERIFY value '${skipVerify}', ignoring`);
    }
  }
  const generateManifest = get('STRESSER_GENERATE_MANIFEST');
  if (generateManifest !== undefined) {
    config.generateManifest = parseBool(generateManifest);
    if (config.generateManifest === undefined) {
      warnings.push(`invalid STRESSER_GENERATE_MANIFEST value '${generateManifest}', ignoring`);
    }
  }

  const putSize = get('STRESSER_PUT_SIZE_KB');
  if (putSize !== undefined) {
    config.putSizeKB = parsePositiveInt(putSize);
    if (config.putSizeKB === undefined) {
      warnings.push(`invalid STRESSER_PUT_SIZE_KB value '${putSize}', keeping ${DEFAULT_PUT_SIZE_KB} KB default`);
    }
  }
  const fileCount = get('STRESSER_FILE_COUNT');
  if (fileCount !== undefined) {
    config.fileCount = parsePositiveInt(fileCount);
    if (config.fileCount === undefined) {
      warnings.push(`invalid STRESSER_FILE_COUNT value '${fileCount}', ignoring`);
    }
  }
  const logLevel = get('STRESSER_LOG_LEVEL');
  if (logLevel !== undefined) {
    const normalized = logLevel.toLowerCase();
    if (isLogLevel(normalized)) {
      config.logLevel = normalized;
    } else {
      warnings.push(`invalid STRESSER_LOG_LEVEL value '${logLevel}', keeping 'info' default`);
    }
  }

  return { config, warnings };
};

export type ConfigSources = {
  file?: ConfigInput;
  env?: ConfigInput;
  flags?: ConfigInput;
};

/** Defaults, then config file, then environment, then command-line flags. */
export const resolveConfig = (sources: ConfigSources): ConfigValidation => {
  return validateConfig(
    mergeConfig(defaultStresserConfig, sources.file ?? {}, sources.env ?? {}, sources.flags ?? {}),
  );
};
