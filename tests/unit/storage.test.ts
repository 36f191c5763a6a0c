/**
 * Unit tests for the Storage Module
 * Tests MemoryStorageAdapter functionality
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { MemoryStorageAdapter, S3StorageAdapter, createStorageAdapter } from '../../src/storage/index.js';
import { ResearchError } from '../../src/errors/index.js';
import { testConfig } from '../helpers/fakes.js';

describe('Storage Module', () => {
  let storage: MemoryStorageAdapter;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
  });

  describe('MemoryStorageAdapter', () => {
    describe('save()', () => {
      test('should save an artifact and return metadata', async () => {
        const content = JSON.stringify({ status: 'completed' });

        const metadata = await storage.save('run_test123', 'record', content);

        expect(metadata.runId).toBe('run_test123');
        expect(metadata.artifactType).toBe('record');
        expect(metadata.fileName).toBe('record.json');
        expect(metadata.contentType).toBe('application/json');
        expect(metadata.size).toBe(Buffer.byteLength(content, 'utf-8'));
        expect(metadata.checksum).toMatch(/^[a-f0-9]{32}$/);
      });

      test('should map known artifact types to their file names', async () => {
        const names = await Promise.all(
          ['target', 'run_artifact', 'outreach', 'notes'].map(async (type) => (await storage.save('run_a', type, '{}')).fileName)
        );

        expect(names).toEqual(['target.json', 'run_artifact.json', 'outreach.json', 'notes.json']);
      });

      test('should honour a custom content type', async () => {
        const metadata = await storage.save('run_a', 'outreach', 'Hello', { contentType: 'text/plain' });

        expect(metadata.contentType).toBe('text/plain');
      });

      test('should measure Buffer content', async () => {
        const content = Buffer.from('binary data');

        const metadata = await storage.save('run_a', 'record', content);

        expect(metadata.size).toBe(11);
      });

      test('should overwrite an existing artifact', async () => {
        await storage.save('run_a', 'record', 'first');
        await storage.save('run_a', 'record', 'second');

        const { content } = await storage.load('run_a', 'record');
        expect(content).toBe('second');
        expect(storage.size()).toBe(1);
      });
    });

    describe('load()', () => {
      test('should load a saved artifact', async () => {
        await storage.save('run_a', 'target', '{"key":"acme-tools.de"}');

        const { content, metadata } = await storage.load('run_a', 'target');

        expect(content).toBe('{"key":"acme-tools.de"}');
        expect(metadata.fileName).toBe('target.json');
      });

      test('should raise ARTIFACT_NOT_FOUND for a missing artifact', async () => {
        const error = await storage.load('run_missing', 'record').then(
          () => null,
          (reason: unknown) => reason
        );

        expect(error).toBeInstanceOf(ResearchError);
        expect(error).toMatchObject({ code: 'ARTIFACT_NOT_FOUND', message: 'Artifact not found: run_missing/record' });
      });
    });

    describe('exists() and list()', () => {
      test('should report only the artifacts of the requested run', async () => {
        await storage.save('run_a', 'target', '{}');
        await storage.save('run_a', 'record', '{}');
        await storage.save('run_b', 'record', '{}');

        expect(await storage.exists('run_a', 'record')).toBe(true);
        expect(await storage.exists('run_a', 'outreach')).toBe(false);
        expect((await storage.list('run_a')).map((artifact) => artifact.artifactType)).toEqual(['target', 'record']);
      });
    });

    describe('delete()', () => {
      test('should delete a single artifact', async () => {
        await storage.save('run_a', 'target', '{}');
        await storage.save('run_a', 'record', '{}');

        await storage.delete('run_a', 'target');

        expect(await storage.exists('run_a', 'target')).toBe(false);
        expect(await storage.exists('run_a', 'record')).toBe(true);
      });

      test('should delete every artifact of a run', async () => {
        await storage.save('run_a', 'target', '{}');
        await storage.save('run_a', 'record', '{}');
        await storage.save('run_b', 'record', '{}');

        await storage.delete('run_a');

        expect(await storage.list('run_a')).toEqual([]);
        expect(storage.size()).toBe(1);
      });
    });

    test('clear() should empty the store', async () => {
      await storage.save('run_a', 'record', '{}');

      storage.clear();

      expect(storage.size()).toBe(0);
    });
  });

  describe('createStorageAdapter()', () => {
    test('should use memory storage without a bucket', () => {
      expect(createStorageAdapter(testConfig())).toBeInstanceOf(MemoryStorageAdapter);
    });

    test('should use S3 when a bucket is configured', () => {
      const adapter = createStorageAdapter(testConfig({ storage: { bucket: 'research-artifacts' } }));

      expect(adapter).toBeInstanceOf(S3StorageAdapter);
    });
  });
});
