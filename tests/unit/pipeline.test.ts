/**
 * Unit tests for the Pipeline Entry Module
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { researchCompanies, researchCompany, type PipelineOptions } from '../../src/pipeline/index.js';
import { generateRunId, loadRunArtifact } from '../../src/run-manager/index.js';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import { silentLogger } from '../../src/observability/index.js';
import type { DownstreamConsumer, ResearchRecord } from '../../src/types/index.js';
import {
  FIXED_NOW,
  FakeAdSource,
  FakeLanguageModel,
  ScriptedExtraction,
  ScriptedRetrievalSource,
  instantPolicies,
  rawAds,
  testConfig,
  testSchema,
  testTarget,
} from '../helpers/fakes.js';

const input = { url: 'https://acme-tools.de', name: 'Acme Tools' };
const runId = generateRunId(testTarget(), FIXED_NOW, 60);

const emailJson = JSON.stringify({
  subject_line: 'Your carousel ads',
  email_body: 'Hi Acme team',
  key_insights_used: ['carousel'],
  personalization_score: 7,
});

const fullExtraction = {
  overview: { summary: 'Tools maker', industry: 'Manufacturing' },
  advertising: { advertising_status: 'active_advertiser', creative_formats: ['image'] },
};

describe('Pipeline Module', () => {
  let storage: MemoryStorageAdapter;

  beforeEach(() => {
    storage = new MemoryStorageAdapter();
  });

  function options(overrides: Partial<PipelineOptions> = {}): PipelineOptions {
    return {
      config: testConfig({ idempotencyWindowMinutes: 60, meta: { accessToken: 'test-token' } }),
      retrievalSource: new ScriptedRetrievalSource(),
      extraction: new ScriptedExtraction([fullExtraction]),
      adSource: new FakeAdSource(rawAds()),
      languageModel: new FakeLanguageModel([emailJson]),
      storage,
      policies: instantPolicies(),
      schema: testSchema(),
      logger: silentLogger,
      now: () => FIXED_NOW,
      ...overrides,
    };
  }

  test('should research, store and hand the record to consumers', async () => {
    const result = await researchCompany(input, options());

    expect(result.success).toBe(true);
    expect(result.metadata.runId).toBe(runId);
    expect(result.data?.record.runId).toBe(runId);
    expect(result.data?.record.status).toBe('completed');
    expect(result.data?.reused).toBe(false);
    expect(result.data?.consumers).toEqual([{ name: 'outreach', success: true }]);

    const artifact = await loadRunArtifact(runId, storage);
    expect(artifact.status).toBe('completed');
    expect(artifact.quality_overall).toBe(1);
    expect(artifact.schema_version).toBe('test-1');
    expect(artifact.artifacts).toEqual({ target: true, record: true, run_artifact: true, outreach: true });
    expect(artifact.consumers.outreach?.status).toBe('success');
  });

  test('should return the stored record for a repeat request in the same window', async () => {
    const first = await researchCompany(input, options());
    const extraction = new ScriptedExtraction([fullExtraction]);

    const second = await researchCompany(input, options({ extraction }));

    expect(second.data?.reused).toBe(true);
    expect(second.data?.consumers).toEqual([]);
    expect(second.data?.record).toEqual(first.data?.record);
    expect(extraction.requests).toHaveLength(0);
  });

  test('should report a failing consumer without failing the run', async () => {
    const crm: DownstreamConsumer = {
      name: 'crm',
      consume: async (_record: ResearchRecord): Promise<void> => {
        throw new Error('crm offline');
      },
    };

    const result = await researchCompany(input, options({ consumers: [crm] }));

    expect(result.success).toBe(true);
    expect(result.data?.consumers).toEqual([{ name: 'crm', success: false, error: 'crm offline' }]);
    expect((await loadRunArtifact(runId, storage)).consumers.crm).toMatchObject({ status: 'failed', error: 'crm offline' });
  });

  test('should skip outreach when drafting is turned off', async () => {
    const result = await researchCompany(input, options({ draftOutreach: false }));

    expect(result.data?.consumers).toEqual([]);
    expect(await storage.exists(runId, 'outreach')).toBe(false);
  });

  test('should fail with RUN_FAILED when nothing was found', async () => {
    const result = await researchCompany(
      input,
      options({
        config: testConfig({ idempotencyWindowMinutes: 60, maxRounds: 1 }),
        extraction: new ScriptedExtraction([]),
        adSource: null,
      })
    );

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('RUN_FAILED');
    expect(result.error?.message).toBe('No profile data obtained after 1 round(s)');
    expect(result.error?.details).toMatchObject({ lastState: { phase: 'FAILED', runId } });

    const artifact = await loadRunArtifact(runId, storage);
    expect(artifact.status).toBe('failed');
    expect(artifact.errors).toEqual(['No profile data obtained after 1 round(s)']);
  });

  test('should reject input without a URL or name', async () => {
    const result = await researchCompany({ notes: 'no target' }, options());

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('TARGET_REQUIRED');
    expect(storage.size()).toBe(0);
  });

  test('should report invalid configuration', async () => {
    const result = await researchCompany(input, { env: { MAX_ROUNDS: '0' }, storage, logger: silentLogger });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('CONFIG_INVALID');
  });

  describe('researchCompanies()', () => {
    test('should return a result for every target when some fail', async () => {
      const results = await researchCompanies([input, { notes: 'no target' }], { ...options(), concurrency: 2 });

      expect(results).toHaveLength(2);
      expect(results[0]?.success).toBe(true);
      expect(results[0]?.data?.record.runId).toBe(runId);
      expect(results[0]?.data?.record.status).toBe('completed');
      expect(results[1]?.success).toBe(false);
      expect(results[1]?.error?.code).toBe('TARGET_REQUIRED');
      expect((await loadRunArtifact(runId, storage)).status).toBe('completed');
    });

    test('should keep researching after a target whose run fails', async () => {
      const other = { url: 'https://blue-ocean-labs.io', name: 'Blue Ocean Labs' };
      const extraction = new ScriptedExtraction([fullExtraction]);

      const results = await researchCompanies([input, other], {
        ...options({ extraction, config: testConfig({ idempotencyWindowMinutes: 60, maxRounds: 1 }), adSource: null }),
        concurrency: 1,
      });

      expect(results.map((result) => result.success)).toEqual([true, false]);
      expect(results[1]?.error?.code).toBe('RUN_FAILED');
      expect(results[1]?.error?.message).toBe('No profile data obtained after 1 round(s)');
    });

    test('should reject a concurrency below one for every target', async () => {
      const results = await researchCompanies([input, input], { ...options(), concurrency: 0 });

      expect(results.map((result) => result.error?.code)).toEqual(['CONFIG_INVALID', 'CONFIG_INVALID']);
      expect(storage.size()).toBe(0);
    });
  });
});
