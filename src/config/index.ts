import './location.js';
import config from 'config';

export type AppConfig = {
  name: string;
  title: string;
};

export type LoggingConfig = {
  level: string;
};

export type DisplayMode = 'terminal' | 'log';

export type MonitorSettings = {
  messages: string[];
  refreshIntervalMs: number;
  display: DisplayMode;
};

export type ReadinessConfig = {
  pollIntervalMs: number;
  timeoutMs: number;
  graceMs: number;
  /**
   * When false the session keeps listening without a discovered system
   * instead of exiting after the grace wait.
   */
  failWithoutSystem: boolean;
};

export type ConnectionConfig = {
  systemId: number;
  componentId: number;
  heartbeatIntervalMs: number;
  verifyChecksums: boolean;
};

export type MonitorConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  monitor: MonitorSettings;
  readiness: ReadinessConfig;
  connection: ConnectionConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  items?: JsonSchema;
  enum?: string[];
  minimum?: number;
  maximum?: number;
  minItems?: number;
  integer?: boolean;
};

const monitorConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'monitor', 'readiness', 'connection'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name', 'title'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' },
        title: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    monitor: {
      type: 'object',
      required: ['messages', 'refreshIntervalMs', 'display'],
      additionalProperties: false,
      properties: {
        messages: { type: 'array', minItems: 1, items: { type: 'string' } },
        refreshIntervalMs: { type: 'number', minimum: 1 },
        display: { type: 'string', enum: ['terminal', 'log'] }
      }
    },
    readiness: {
      type: 'object',
      required: ['pollIntervalMs', 'timeoutMs', 'graceMs', 'failWithoutSystem'],
      additionalProperties: false,
      properties: {
        pollIntervalMs: { type: 'number', minimum: 1 },
        timeoutMs: { type: 'number', minimum: 0 },
        graceMs: { type: 'number', minimum: 0 },
        failWithoutSystem: { type: 'boolean' }
      }
    },
    connection: {
      type: 'object',
      required: ['systemId', 'componentId', 'heartbeatIntervalMs', 'verifyChecksums'],
      additionalProperties: false,
      properties: {
        systemId: { type: 'number', integer: true, minimum: 1, maximum: 255 },
        componentId: { type: 'number', integer: true, minimum: 1, maximum: 255 },
        heartbeatIntervalMs: { type: 'number', minimum: 0 },
        verifyChecksums: { type: 'boolean' }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const { type } = schema;
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    if (schema.additionalProperties === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    if (typeof schema.minItems === 'number' && value.length < schema.minItems) {
      errors.push(`${pathLabel} must contain at least ${schema.minItems} item(s)`);
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

function validateLogicalConfig(config: MonitorConfig) {
  const messages: string[] = [];
  const seen = new Set<string>();

  config.monitor.messages.forEach((name, index) => {
    if (name.trim().length === 0) {
      messages.push(`config.monitor.messages[${index}] must not be empty`);
      return;
    }
    if (seen.has(name)) {
      messages.push(`config.monitor.messages[${index}] duplicates "${name}"`);
    }
    seen.add(name);
  });

  if (config.readiness.timeoutMs > 0 && config.readiness.pollIntervalMs > config.readiness.timeoutMs) {
    messages.push('config.readiness.pollIntervalMs must not exceed config.readiness.timeoutMs');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function validateConfig(config: unknown): asserts config is MonitorConfig {
  const errors = validateAgainstSchema(monitorConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as MonitorConfig);
}

/**
 * Validated view of the layered `config` sources (default.json, the NODE_ENV
 * file and environment overrides).
 */
export function resolveConfig(): MonitorConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}
