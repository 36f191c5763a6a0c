/**
 * Unit tests for the Run Manager Module
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import {
  roundTimestamp,
  generateRunId,
  checkIdempotency,
  createRun,
  updateRunStatus,
  markArtifactComplete,
  recordConsumerResult,
  saveResearchRecord,
  loadResearchRecord,
  loadRunArtifact,
} from '../../src/run-manager/index.js';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import { FIXED_NOW, researchRecord, testTarget } from '../helpers/fakes.js';

describe('Run Manager Module', () => {
  let storage: MemoryStorageAdapter;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
  });

  describe('roundTimestamp()', () => {
    test('should round down to the start of the window', () => {
      expect(roundTimestamp('2024-06-03T09:41:59.999Z', 10)).toBe('2024-06-03T09:40:00.000Z');
      expect(roundTimestamp(FIXED_NOW, 60)).toBe('2024-06-03T09:00:00.000Z');
      expect(roundTimestamp('2024-06-03T09:40:00.000Z', 10)).toBe('2024-06-03T09:40:00.000Z');
    });

    test('should reject an invalid timestamp', () => {
      expect(() => roundTimestamp('not a date', 10)).toThrow('Invalid timestamp: not a date');
    });
  });

  describe('generateRunId()', () => {
    test('should produce a prefixed 16-character hex ID', () => {
      expect(generateRunId(testTarget(), FIXED_NOW, 10)).toMatch(/^run_[a-f0-9]{16}$/);
    });

    test('should be stable inside one window', () => {
      const a = generateRunId(testTarget(), '2024-06-03T09:40:01.000Z', 10);
      const b = generateRunId(testTarget(), '2024-06-03T09:49:59.000Z', 10);

      expect(a).toBe(b);
    });

    test('should differ across windows and targets', () => {
      const base = generateRunId(testTarget(), '2024-06-03T09:40:01.000Z', 10);

      expect(generateRunId(testTarget(), '2024-06-03T09:50:00.000Z', 10)).not.toBe(base);
      expect(generateRunId(testTarget({ name: 'Blue Ocean Labs' }), '2024-06-03T09:40:01.000Z', 10)).not.toBe(base);
    });
  });

  describe('createRun()', () => {
    test('should store the target and a running artifact', async () => {
      const result = await createRun('run_a', testTarget(), storage);

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({ runId: 'run_a', status: 'running', artifacts: ['target', 'run_artifact'], reused: false });
      expect(JSON.parse((await storage.load('run_a', 'target')).content.toString())).toMatchObject({ key: 'acme-tools.de' });
      const artifact = await loadRunArtifact('run_a', storage);
      expect(artifact.target_key).toBe('acme-tools.de');
      expect(artifact.errors).toEqual([]);
    });

    test('should reuse a finished run', async () => {
      await createRun('run_a', testTarget(), storage);
      await updateRunStatus('run_a', 'completed', storage, { qualityOverall: 0.8 });

      const result = await createRun('run_a', testTarget(), storage);

      expect(result.data).toMatchObject({ status: 'completed', reused: true });
    });

    test('should restart a failed run', async () => {
      await createRun('run_a', testTarget(), storage);
      await updateRunStatus('run_a', 'failed', storage, { error: 'No profile data obtained after 3 round(s)' });

      const result = await createRun('run_a', testTarget(), storage);

      expect(result.data).toMatchObject({ status: 'running', reused: false, error: 'restarted after status failed' });
    });

    test('should fail when the stored artifact is corrupt', async () => {
      await storage.save('run_a', 'run_artifact', '{not json');

      const result = await createRun('run_a', testTarget(), storage);

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('IDEMPOTENCY_CHECK_ERROR');
      expect(result.error?.message).toBe('Failed to check idempotency: Stored run artifact is not valid JSON');
    });
  });

  describe('checkIdempotency()', () => {
    test('should report a missing run', async () => {
      const result = await checkIdempotency('run_missing', storage);

      expect(result.data).toEqual({ exists: false });
    });
  });

  describe('updateRunStatus()', () => {
    test('should set terminal status details', async () => {
      await createRun('run_a', testTarget(), storage);

      const result = await updateRunStatus('run_a', 'partial', storage, {
        qualityOverall: 0.55,
        schemaVersion: 'test-1',
        error: 'round 1: BATCH_EMPTY',
      });

      expect(result.data?.status).toBe('partial');
      const artifact = await loadRunArtifact('run_a', storage);
      expect(artifact.completed_at).not.toBeNull();
      expect(artifact.quality_overall).toBe(0.55);
      expect(artifact.schema_version).toBe('test-1');
      expect(artifact.errors).toEqual(['round 1: BATCH_EMPTY']);
    });

    test('should fail for an unknown run', async () => {
      const result = await updateRunStatus('run_missing', 'completed', storage);

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe('STATUS_UPDATE_ERROR');
    });
  });

  describe('markArtifactComplete() and recordConsumerResult()', () => {
    test('should track stored artifacts and consumer outcomes', async () => {
      await createRun('run_a', testTarget(), storage);

      await markArtifactComplete('run_a', 'record', storage);
      await recordConsumerResult('run_a', 'outreach', { success: false, error: 'model unavailable' }, storage);

      const artifact = await loadRunArtifact('run_a', storage);
      expect(artifact.artifacts.record).toBe(true);
      expect(artifact.consumers.outreach).toMatchObject({ status: 'failed', error: 'model unavailable' });
    });
  });

  describe('research records', () => {
    test('should save and reload a record', async () => {
      const record = await researchRecord('run_a');

      await saveResearchRecord(record, storage);

      expect(await loadResearchRecord('run_a', storage)).toEqual(record);
    });

    test('should reject a stored record with the wrong shape', async () => {
      await storage.save('run_a', 'record', JSON.stringify({ runId: 'run_a' }));

      await expect(loadResearchRecord('run_a', storage)).rejects.toMatchObject({ code: 'ARTIFACT_INVALID' });
    });

    test('should raise ARTIFACT_NOT_FOUND for a missing record', async () => {
      await expect(loadResearchRecord('run_missing', storage)).rejects.toMatchObject({ code: 'ARTIFACT_NOT_FOUND' });
    });
  });
});
