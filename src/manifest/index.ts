/**
 * ABOUTME: Manifest creation, (de)serialization and persistence.
 * The JSON form uses snake_case keys and omits absent fields; parsing is
 * validated with zod and rejects malformed documents with a ManifestError.
 */

import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { arch, platform } from 'node:os';
import { randomBytes } from 'node:crypto';
import { ManifestError, errorMessage } from '../errors.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';
import { getControlPath, MANIFEST_FILE } from '../workspace/paths.js';
import type { RunState } from '../engine/types.js';
import { KNOWN_HARNESSES, PROTOCOL_VERSION, isProtocolCompatible } from './protocol.js';
import type { EnvironmentInfo, HarnessInfo, Manifest, TaskInfo } from './types.js';

export type { Manifest, HarnessInfo, TaskInfo, RunInfo, EnvironmentInfo } from './types.js';
export * from './protocol.js';

const RunStatusSchema = z.enum(['pending', 'in_progress', 'completed', 'failed', 'timeout']);

const ManifestJsonSchema = z.object({
  protocol_version: z.string().min(1),
  harness: z.object({
    id: z.string().min(1),
    version: z.string().optional(),
    vendor: z.string().optional(),
    model: z.string().optional(),
    config: z.record(z.string(), z.unknown()).optional(),
  }),
  task: z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    domain: z.string().optional(),
    level: z.number().int().optional(),
  }),
  run: z.object({
    id: z.string().min(1),
    status: RunStatusSchema.default('pending'),
    started_at: z.string().datetime({ offset: true }).optional(),
    completed_at: z.string().datetime({ offset: true }).optional(),
    metadata: z.record(z.string(), z.unknown()).optional(),
  }),
  environment: z
    .object({
      os: z.string(),
      arch: z.string(),
      node_version: z.string(),
    })
    .optional(),
});

type ManifestJson = z.infer<typeof ManifestJsonSchema>;

/**
 * Generate a run id of the form run_<8 hex>.
 */
export function generateRunId(): string {
  return `run_${randomBytes(4).toString('hex')}`;
}

/**
 * Git branch a run's commits belong on.
 */
export function getBranchName(manifest: Manifest): string {
  return `harness/${manifest.harness.id}/${manifest.task.id}/${manifest.run.id}`;
}

export function detectEnvironment(): EnvironmentInfo {
  return { os: platform(), arch: arch(), nodeVersion: process.versions.node };
}

export interface CreateManifestOptions {
  harness: HarnessInfo;
  task: TaskInfo;
  runId?: string;
  metadata?: Record<string, unknown>;
  environment?: EnvironmentInfo | false;
}

export function createManifest(options: CreateManifestOptions): Manifest {
  const vendor = options.harness.vendor ?? KNOWN_HARNESSES[options.harness.id]?.vendor;
  return {
    protocolVersion: PROTOCOL_VERSION,
    harness: vendor !== undefined ? { ...options.harness, vendor } : { ...options.harness },
    task: { ...options.task },
    run: {
      id: options.runId ?? generateRunId(),
      status: 'pending',
      ...(options.metadata ? { metadata: options.metadata } : {}),
    },
    ...(options.environment === false
      ? {}
      : { environment: options.environment ?? detectEnvironment() }),
  };
}

/**
 * Mirror a run state into the manifest's run section.
 */
export function applyRunState(manifest: Manifest, state: RunState): Manifest {
  const run = { ...manifest.run, status: state.status };
  if (state.startedAt) run.startedAt = state.startedAt;
  else delete run.startedAt;
  if (state.completedAt) run.completedAt = state.completedAt;
  else delete run.completedAt;
  return { ...manifest, run };
}

export function toManifestJson(manifest: Manifest): ManifestJson {
  const { harness, task, run, environment } = manifest;
  // Absent fields stay undefined and drop out of the JSON text
  return {
    protocol_version: manifest.protocolVersion,
    harness: { ...harness },
    task: { ...task },
    run: {
      id: run.id,
      status: run.status,
      started_at: run.startedAt,
      completed_at: run.completedAt,
      metadata: run.metadata,
    },
    environment: environment
      ? { os: environment.os, arch: environment.arch, node_version: environment.nodeVersion }
      : undefined,
  };
}

export function serializeManifest(manifest: Manifest): string {
  return JSON.stringify(toManifestJson(manifest), null, 2);
}

function fromManifestJson(json: ManifestJson): Manifest {
  const manifest: Manifest = {
    protocolVersion: json.protocol_version,
    harness: { id: json.harness.id },
    task: { id: json.task.id },
    run: { id: json.run.id, status: json.run.status },
  };
  const { version, vendor, model, config } = json.harness;
  if (version !== undefined) manifest.harness.version = version;
  if (vendor !== undefined) manifest.harness.vendor = vendor;
  if (model !== undefined) manifest.harness.model = model;
  if (config !== undefined) manifest.harness.config = config;
  const { name, domain, level } = json.task;
  if (name !== undefined) manifest.task.name = name;
  if (domain !== undefined) manifest.task.domain = domain;
  if (level !== undefined) manifest.task.level = level;
  if (json.run.started_at !== undefined) manifest.run.startedAt = json.run.started_at;
  if (json.run.completed_at !== undefined) manifest.run.completedAt = json.run.completed_at;
  if (json.run.metadata !== undefined) manifest.run.metadata = json.run.metadata;
  if (json.environment) {
    manifest.environment = {
      os: json.environment.os,
      arch: json.environment.arch,
      nodeVersion: json.environment.node_version,
    };
  }
  return manifest;
}

/**
 * Parse and validate a manifest document.
 * @throws ManifestError on invalid JSON, schema violations or an incompatible protocol major
 */
export function parseManifest(text: string, source?: string): Manifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ManifestError(`Manifest is not valid JSON: ${errorMessage(error)}`, source, { cause: error });
  }

  const parsed = ManifestJsonSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ManifestError(`Invalid manifest: ${problems}`, source);
  }

  if (!isProtocolCompatible(parsed.data.protocol_version)) {
    throw new ManifestError(
      `Unsupported protocol version ${parsed.data.protocol_version} (expected ${PROTOCOL_VERSION.split('.')[0]}.x)`,
      source,
    );
  }

  return fromManifestJson(parsed.data);
}

export function getManifestPath(workspace: string): string {
  return getControlPath(workspace, MANIFEST_FILE);
}

export async function saveManifest(workspace: string, manifest: Manifest): Promise<void> {
  await writeJsonAtomic(getManifestPath(workspace), toManifestJson(manifest));
}

/**
 * Load the manifest of a workspace, or null when there is none.
 * @throws ManifestError when the file exists but is invalid
 */
export async function loadManifest(workspace: string): Promise<Manifest | null> {
  const path = getManifestPath(workspace);
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch {
    return null;
  }
  return parseManifest(text, path);
}
