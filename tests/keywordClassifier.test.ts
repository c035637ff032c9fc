import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { KeywordClassifier } from '../src/reasoner/keywordClassifier.js';

describe('KeywordClassifier', () => {
  const classifier = new KeywordClassifier();

  it('routes mutation requests to parameter', async () => {
    assert.deepEqual(await classifier.classify('Set the base power to 150', []), {
      kind: 'classified',
      label: 'parameter',
      confidence: 1
    });
  });

  it('routes run requests to generation', async () => {
    assert.deepEqual(await classifier.classify('Generate the PV curve', []), {
      kind: 'classified',
      label: 'generation',
      confidence: 1
    });
  });

  it('routes comparisons to analysis', async () => {
    const verdict = await classifier.classify('compare the last two runs', []);
    assert.deepEqual(verdict, { kind: 'classified', label: 'analysis', confidence: 1 });
  });

  it('scores mixed messages by share of cue hits', async () => {
    const verdict = await classifier.classify('What is a PV curve?', []);
    assert.equal(verdict.kind, 'classified');
    if (verdict.kind !== 'classified') return;
    assert.equal(verdict.label, 'question');
    assert.equal(verdict.confidence, 2 / 3);
  });

  it('keeps a compound set-and-run request on parameter', async () => {
    const verdict = await classifier.classify('set step size to 0.05 and run the simulation', []);
    assert.deepEqual(verdict, { kind: 'classified', label: 'parameter', confidence: 2 / 3 });
  });

  it('reports unclassifiable when no cue matches', async () => {
    assert.deepEqual(await classifier.classify('hello there', []), {
      kind: 'unclassifiable',
      reason: 'no cue words found'
    });
  });
});
