/**
 * Unit Tests for Config MCP Tools
 *
 * Tools: handleConfigGet, handleConfigSet
 *
 * Real state with an in-memory run store for persistence.
 *
 * @module tests/unit/tools/config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resolve } from 'path';
import { handleConfigGet, handleConfigSet, configTools } from '../../../src/tools/config.js';
import { getConfig, requireRunStore, resetState, setRunStore } from '../../../src/server/state.js';
import { RunStore } from '../../../src/services/storage/run-store.js';
import { parseResponse } from '../../helpers.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL EXPORTS VERIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('configTools exports', () => {
  it('exports both config tools', () => {
    expect(Object.keys(configTools)).toEqual(['duplex_config_get', 'duplex_config_set']);
  });

  it('each tool has description, inputSchema, and handler', () => {
    for (const [name, tool] of Object.entries(configTools)) {
      expect(typeof tool.description, `${name} missing description`).toBe('string');
      expect(tool.inputSchema, `${name} missing inputSchema`).toBeDefined();
      expect(typeof tool.handler).toBe('function');
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleConfigGet TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleConfigGet', () => {
  beforeEach(() => {
    resetState();
  });

  afterEach(() => {
    resetState();
  });

  it('returns all config when no key specified', async () => {
    const result = parseResponse(await handleConfigGet({}));

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      remove_first_last: true,
      add_watermarks: true,
      rotation_angle: 180,
      batch_size: 20,
      duplex_scope: 'per_batch',
      output_mode: 'batched',
      overwrite: false,
      title_image_path: null,
    });
    expect(result.data?.data_path).toBe(getConfig().dataPath);
  });

  it('returns a single key', async () => {
    const result = parseResponse(await handleConfigGet({ key: 'batch_size' }));

    expect(result.data?.key).toBe('batch_size');
    expect(result.data?.value).toBe(20);
  });

  it('rejects an unknown key', async () => {
    const result = parseResponse(await handleConfigGet({ key: 'color_profile' }));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('VALIDATION_ERROR');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// handleConfigSet TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('handleConfigSet', () => {
  beforeEach(() => {
    resetState();
    setRunStore(RunStore.inMemory());
  });

  afterEach(() => {
    resetState();
  });

  it('applies and persists a value', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'batch_size', value: 10 }));

    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({ key: 'batch_size', value: 10, updated: true, persisted: true });
    expect(getConfig().batchSize).toBe(10);
    expect(requireRunStore().loadPersistedConfig()).toEqual({ batch_size: 10 });
  });

  it('returns the resolved path for path keys', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'output_dir', value: 'prints' }));

    expect(result.data?.value).toBe(resolve('prints'));
    expect(getConfig().outputDir).toBe(resolve('prints'));
  });

  it('clears the title image with null', async () => {
    await handleConfigSet({ key: 'title_image_path', value: '/img/logo.png' });
    const result = parseResponse(await handleConfigSet({ key: 'title_image_path', value: null }));

    expect(result.data?.value).toBeNull();
    expect(getConfig().titleImagePath).toBeNull();
  });

  it('rejects a rotation that is not 90/180/270 without changing config', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'rotation_angle', value: 45 }));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('VALIDATION_ERROR');
    expect(result.error?.message).toBe('Invalid value for rotation_angle: rotation_angle must be 90, 180 or 270');
    expect(getConfig().rotationAngle).toBe(180);
    expect(requireRunStore().loadPersistedConfig()).toEqual({});
  });

  it('rejects a value of the wrong type', async () => {
    const result = parseResponse(await handleConfigSet({ key: 'overwrite', value: 'yes' }));

    expect(result.success).toBe(false);
    expect(result.error?.details).toEqual({ key: 'overwrite', value: 'yes' });
  });

  it('reports a persistence failure', async () => {
    requireRunStore().close();

    const result = parseResponse(await handleConfigSet({ key: 'overwrite', value: true }));

    expect(result.success).toBe(false);
    expect(result.error?.category).toBe('INTERNAL_ERROR');
    expect(result.error?.message).toMatch(/^Config value set but persistence failed: Run store :memory: is closed/);
  });
});
