import { describe, expect, it } from 'vitest';
import { ReasoningEngine } from '../../src/services/reasoning/ReasoningEngine.js';
import { NOT_FOUND } from '../../src/domain/verification/FieldValue.js';
import type { NormalizedRecord } from '../../src/domain/verification/types.js';
import {
  ModelUnavailableError,
  PipelineTimeoutError,
  ReasoningBackendError,
  ReasoningParseError,
} from '../../src/utils/errors.js';
import { FakeReasoningBackend, verdictText } from '../helpers/fakes.js';

const record: NormalizedRecord = {
  landlord: { kind: 'text', value: 'Ramesh Sharma' },
  tenant: NOT_FOUND,
  rent_amount: { kind: 'money', amount: 22000, currency: 'INR' },
};

const validVerdict = verdictText(
  [{ label: 'Clear rent terms', explanation: 'Monthly rent is stated' }],
  [{ label: 'Tenant identity missing', explanation: 'No tenant name found' }]
);

const engineFor = (backend: FakeReasoningBackend, callTimeoutMs = 50) =>
  new ReasoningEngine(backend, { callTimeoutMs, retryDelayMs: 0 });

describe('ReasoningEngine', () => {
  it('returns a structured verdict', async () => {
    const backend = new FakeReasoningBackend([validVerdict]);

    const verdict = await engineFor(backend).assess(record, 'rent_agreement');

    expect(verdict).toEqual({
      benefits: [{ label: 'Clear rent terms', explanation: 'Monthly rent is stated' }],
      risks: [{ label: 'Tenant identity missing', explanation: 'No tenant name found' }],
      strategy: 'structured',
    });
    expect(backend.calls).toHaveLength(1);
  });

  it('shows unresolved fields and formatted values in the prompt', async () => {
    const backend = new FakeReasoningBackend([validVerdict]);

    await engineFor(backend).assess(record, 'rent_agreement');

    const { userPrompt, systemPrompt, documentType } = backend.calls[0];
    expect(documentType).toBe('rent_agreement');
    expect(userPrompt).toContain('Document Type: Rent Agreement');
    expect(userPrompt).toContain('"tenant": "not found"');
    expect(userPrompt).toContain('"rent_amount": "INR 22000.00"');
    expect(userPrompt).toContain('- Stamp duty paid and stated');
    expect(systemPrompt).toContain('<verdict>');
  });

  it('reports the heuristic strategy', async () => {
    const backend = new FakeReasoningBackend(['BENEFITS:\n- Seal present\nRISKS:\n- Validity period missing']);

    const verdict = await engineFor(backend).assess({}, 'noc');

    expect(verdict.strategy).toBe('heuristic');
    expect(verdict.risks).toEqual([{ label: 'Validity period missing', explanation: '' }]);
  });

  it('fails with ReasoningParseError rather than returning an empty verdict', async () => {
    const backend = new FakeReasoningBackend(['I cannot help with that request.']);

    await expect(engineFor(backend).assess(record, 'rent_agreement')).rejects.toBeInstanceOf(ReasoningParseError);
    expect(backend.calls).toHaveLength(1);
  });

  it('reports an empty completion as a parse failure without retrying', async () => {
    const backend = new FakeReasoningBackend(['']);

    await expect(engineFor(backend).assess(record, 'rent_agreement')).rejects.toThrow(
      new ReasoningParseError('Reasoning response was empty')
    );
    expect(backend.calls).toHaveLength(1);
  });

  it('retries a timed out call once', async () => {
    const backend = new FakeReasoningBackend(['hang', validVerdict]);

    const verdict = await engineFor(backend, 20).assess(record, 'rent_agreement');

    expect(verdict.risks).toHaveLength(1);
    expect(backend.calls).toHaveLength(2);
  });

  it('fails with ReasoningBackendError after a second transient failure', async () => {
    const backend = new FakeReasoningBackend([
      new ModelUnavailableError('connection refused'),
      new ModelUnavailableError('connection refused'),
      validVerdict,
    ]);

    await expect(engineFor(backend).assess(record, 'rent_agreement')).rejects.toThrow(
      'Reasoning backend failed: connection refused'
    );
    expect(backend.calls).toHaveLength(2);
  });

  it('does not retry a non-transient failure', async () => {
    const backend = new FakeReasoningBackend([new Error('401 invalid api key'), validVerdict]);

    await expect(engineFor(backend).assess(record, 'rent_agreement')).rejects.toBeInstanceOf(ReasoningBackendError);
    expect(backend.calls).toHaveLength(1);
  });

  it('surfaces an aborted request as a timeout', async () => {
    const backend = new FakeReasoningBackend(['hang']);
    const controller = new AbortController();
    const pending = engineFor(backend, 1000).assess(record, 'rent_agreement', controller.signal);

    controller.abort(new PipelineTimeoutError('Request exceeded 10ms'));

    await expect(pending).rejects.toThrow('Request exceeded 10ms');
    expect(backend.calls).toHaveLength(1);
  });
});
