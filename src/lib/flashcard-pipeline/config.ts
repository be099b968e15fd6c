/**
 * Configuration loading.
 *
 * Defaults, overlaid by an optional YAML file, overlaid by explicit
 * overrides. The API key only ever comes from the environment.
 */

import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { PipelineConfig, PipelineConfigOverrides } from './types';
import { DEFAULT_PIPELINE_CONFIG, mergeConfig } from './types';
import { ConfigurationError } from './errors';

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export const API_KEY_ENV_VARS = ['ANKIFY_API_KEY', 'OPENAI_API_KEY'] as const;

const ConfigFileSchema = z
  .object({
    models: z
      .object({
        extractor: z.string(),
        classifier: z.string(),
        answerer: z.string(),
      })
      .partial(),
    llm: z
      .object({
        base_url: z.string().url(),
        temperature: z.number().min(0).max(2),
        timeout_ms: z.number().int().positive(),
        max_retries: z.number().int().min(0).max(10),
        call_delay_ms: z.number().int().min(0),
      })
      .partial(),
    paths: z
      .object({
        data_dir: z.string(),
        flashcards_dir: z.string(),
      })
      .partial(),
    heuristics: z
      .object({
        min_message_length: z.number().int().min(0),
        min_tail_lines: z.number().int().min(1),
        tail_fraction: z.number().gt(0).max(1),
      })
      .partial(),
    classifier: z
      .object({
        min_question_length: z.number().int().min(0),
        require_question_mark: z.boolean(),
        exclusion_phrases: z.array(z.string()),
        use_judge: z.boolean(),
      })
      .partial(),
    extraction: z
      .object({
        mode: z.enum(['per_message', 'conversation']),
        message_char_budget: z.number().int().positive(),
        conversation_char_budget: z.number().int().positive(),
        response_list_keys: z.array(z.string()).min(1),
        regex_fallback: z.boolean(),
        dedupe_within_conversation: z.boolean(),
      })
      .partial(),
    output: z
      .object({
        formats: z.array(z.enum(['anki', 'csv', 'markdown', 'jsonl', 'json'])),
        base_tags: z.array(z.string()),
      })
      .partial(),
    verbose: z.boolean(),
  })
  .partial();

/**
 * Parse YAML text into config overrides.
 * Throws ConfigurationError on invalid YAML or unknown value shapes.
 */
export function parseConfigYaml(text: string, source = DEFAULT_CONFIG_FILE): PipelineConfigOverrides {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (raw === undefined || raw === null) return {};

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration in ${source}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}

export function readApiKey(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const name of API_KEY_ENV_VARS) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

export interface LoadConfigOptions {
  /** Explicit file; must exist. Without it, ./config.yaml is used if present. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: PipelineConfigOverrides;
}

export function loadConfig({ configPath, env = process.env, overrides = {} }: LoadConfigOptions = {}): PipelineConfig {
  let fileOverrides: PipelineConfigOverrides = {};

  const file = configPath ?? (existsSync(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined);
  if (file) {
    if (!existsSync(file)) {
      throw new ConfigurationError(`Config file not found: ${file}`);
    }
    fileOverrides = parseConfigYaml(readFileSync(file, 'utf-8'), file);
  }

  const fromFile = mergeConfig(DEFAULT_PIPELINE_CONFIG, fileOverrides);
  const apiKey = readApiKey(env);
  const withKey = apiKey ? mergeConfig(fromFile, { llm: { api_key: apiKey } }) : fromFile;
  return mergeConfig(withKey, overrides);
}
