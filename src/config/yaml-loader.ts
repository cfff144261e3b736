import { promises as fs } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import type { z } from 'zod';
import { ConfigurationError, toError } from '../utils/errors';
import { type LlmFile, LlmFileSchema, type PipelineFile, PipelineFileSchema } from './yaml-types';

const CONFIG_ROOT = process.env.CONFIG_ROOT ?? path.resolve(process.cwd(), 'config');

const cache = new Map<string, unknown>();

async function readYamlFile(filePath: string): Promise<unknown> {
  try {
    const fileContents = await fs.readFile(filePath, 'utf-8');
    return YAML.parse(fileContents, { prettyErrors: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigurationError(`Missing configuration file: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${toError(error).message}`
    );
  }
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, fileLabel: string): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration in ${fileLabel}: ${issues}`);
  }
  return result.data;
}

async function loadConfigFile<S extends z.ZodTypeAny>(
  schema: S,
  relativePath: string,
  explicitPath?: string
): Promise<z.output<S>> {
  const resolvedPath = explicitPath ?? path.resolve(CONFIG_ROOT, relativePath);

  let yamlValue = cache.get(resolvedPath);
  if (yamlValue === undefined) {
    yamlValue = await readYamlFile(resolvedPath);
    cache.set(resolvedPath, yamlValue);
  }

  return validate(schema, yamlValue, resolvedPath);
}

export function clearConfigCache(): void {
  cache.clear();
}

export async function loadPipelineConfig(overridePath?: string): Promise<PipelineFile> {
  return loadConfigFile(PipelineFileSchema, 'pipeline.yaml', overridePath);
}

export async function loadLlmConfig(overridePath?: string): Promise<LlmFile> {
  return loadConfigFile(LlmFileSchema, 'llm.yaml', overridePath);
}
