/**
 * Artifact Emitter - writes planned outputs atomically
 *
 * Every artifact is rendered to a temp file beside its target, then moved
 * into place once all of them rendered. Without overwrite the move is a hard
 * link, which fails on a target created after the collision check. A failure
 * at any point removes the temp files and every artifact this run already
 * placed.
 *
 * @module pipeline/emitter
 */

import { access, link, mkdir, rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { PageSequence } from '../../models/page.js';
import type { ArtifactKind, RunWarning } from '../../models/run.js';
import { settleInGroups } from '../../utils/concurrency.js';
import { writePageSequence, type ContainerRegistry } from '../pdf/container.js';
import { IOFailureError, PipelineError, describeError } from '../sequencing/errors.js';

export const FRONTS_FILE_NAME = 'odd_pages.pdf';
export const BACKS_FILE_NAME = 'even_pages_rotated.pdf';

export function batchFileName(index: number): string {
  return `Batch_${index}.pdf`;
}

export interface PlannedArtifact {
  kind: ArtifactKind;
  fileName: string;
  batchIndex: number | null;
  sequence: PageSequence;
}

export interface EmitOptions {
  outputDir: string;
  overwrite: boolean;
  registry: ContainerRegistry;
  maxConcurrent: number;
}

export interface EmittedArtifact {
  artifact: PlannedArtifact;
  path: string;
}

export interface EmitResult {
  written: EmittedArtifact[];
  warnings: RunWarning[];
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeQuietly(filePaths: readonly string[]): Promise<void> {
  const results = await Promise.allSettled(filePaths.map((filePath) => rm(filePath, { force: true })));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      console.error(`[Emitter] Failed to remove ${filePaths[index]}: ${describeError(result.reason)}`);
    }
  });
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function collisionError(collisions: readonly string[], rolledBack: readonly string[] = []): IOFailureError {
  return new IOFailureError(
    `Refusing to overwrite existing output (${collisions.map((c) => path.basename(c)).join(', ')}). ` +
      'Set overwrite to replace them.',
    collisions[0] ?? '',
    { stage: 'emit', collisions: [...collisions], rolledBack: [...rolledBack] }
  );
}

/**
 * Targets that already exist, in artifact order
 */
export async function findCollisions(
  outputDir: string,
  artifacts: readonly PlannedArtifact[]
): Promise<string[]> {
  const targets = artifacts.map((artifact) => path.join(outputDir, artifact.fileName));
  const present = await Promise.all(targets.map(exists));
  return targets.filter((_, index) => present[index]);
}

/**
 * Write every artifact, all or nothing
 *
 * @throws IOFailureError when a target exists and overwrite is off, or any write or rename fails
 */
export async function emitArtifacts(
  artifacts: readonly PlannedArtifact[],
  options: EmitOptions
): Promise<EmitResult> {
  const outputDir = path.resolve(options.outputDir);

  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new IOFailureError(`Cannot create output directory: ${describeError(error)}`, outputDir, {
      stage: 'emit',
    });
  }

  if (!options.overwrite) {
    const collisions = await findCollisions(outputDir, artifacts);
    if (collisions.length > 0) {
      throw collisionError(collisions);
    }
  }

  const runTag = uuidv4().slice(0, 8);
  const staged = artifacts.map((artifact) => ({
    artifact,
    tempPath: path.join(outputDir, `.${artifact.fileName}.${runTag}.tmp`),
    target: path.join(outputDir, artifact.fileName),
  }));
  const tempPaths = staged.map((entry) => entry.tempPath);

  const rendered = await settleInGroups(staged, options.maxConcurrent, async (entry) => {
    const result = await writePageSequence(entry.artifact.sequence, options.registry);
    await writeFile(entry.tempPath, result.bytes);
    return result.warnings;
  });

  const warnings: RunWarning[] = [];
  for (const result of rendered) {
    if (result.status === 'rejected') {
      await removeQuietly(tempPaths);
      const reason: unknown = result.reason;
      if (reason instanceof PipelineError) {
        throw reason;
      }
      throw new IOFailureError(`Failed to write artifact: ${describeError(reason)}`, outputDir, {
        stage: 'emit',
      });
    }
    warnings.push(...result.value);
  }

  const written: EmittedArtifact[] = [];
  for (const [index, entry] of staged.entries()) {
    try {
      if (options.overwrite) {
        await rename(entry.tempPath, entry.target);
      } else {
        await link(entry.tempPath, entry.target);
      }
    } catch (error) {
      const placed = written.map((done) => done.path);
      await removeQuietly([...tempPaths.slice(index), ...placed]);
      const rolledBack = placed.map((p) => path.basename(p));
      if (errorCode(error) === 'EEXIST') {
        throw collisionError([entry.target], rolledBack);
      }
      throw new IOFailureError(`Failed to place ${entry.artifact.fileName}: ${describeError(error)}`, entry.target, {
        stage: 'emit',
        rolledBack,
      });
    }
    written.push({ artifact: entry.artifact, path: entry.target });
    if (!options.overwrite) {
      await removeQuietly([entry.tempPath]);
    }
  }

  return { written, warnings };
}
