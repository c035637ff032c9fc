import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { DEFAULT_PARAMETERS } from '../src/parameters/definitions.js';
import { MAX_SWEEP_POINTS, TheveninCurveGenerator, busReactance } from '../src/simulation/theveninCurve.js';
import type { ParameterSet } from '../src/types.js';

const close = (actual: number, expected: number, tolerance = 1e-5) =>
  assert.ok(Math.abs(actual - expected) < tolerance, `${actual} is not within ${tolerance} of ${expected}`);

const unityCase: ParameterSet = {
  ...DEFAULT_PARAMETERS,
  grid: 'ieee14',
  monitored_bus: 1,
  base_power: 100,
  step_size: 0.5,
  max_scale: 3,
  power_factor: 1,
  voltage_limit: 0,
  continuation: false
};

describe('TheveninCurveGenerator', () => {
  const generator = new TheveninCurveGenerator();

  it('stops at the nose of the upper branch', async () => {
    const result = await generator.generate(unityCase);
    assert.ok(result.ok);
    const curve = result.value;
    assert.deepEqual(curve.points.map(p => p.power), [100, 150, 200]);
    close(curve.points[0].voltage, 0.96593);
    close(curve.points[1].voltage, 0.91144);
    close(curve.points[2].voltage, 0.70711);
    assert.equal(curve.maxPower, 200);
    assert.equal(curve.criticalVoltage, Math.SQRT1_2);
    assert.equal(curve.noseIndex, 2);
    assert.equal(curve.convergedSteps, 3);
    assert.equal(curve.stoppedBy, 'nose');
  });

  it('follows the lower branch back down when continuation is on', async () => {
    const result = await generator.generate({ ...unityCase, continuation: true });
    assert.ok(result.ok);
    const curve = result.value;
    assert.deepEqual(curve.points.map(p => p.power), [100, 150, 200, 150, 100]);
    close(curve.points[3].voltage, 0.41144);
    close(curve.points[4].voltage, 0.25882);
    assert.equal(curve.noseIndex, 2);
    assert.equal(curve.convergedSteps, 5);
  });

  it('stops at the voltage limit', async () => {
    const result = await generator.generate({ ...unityCase, voltage_limit: 0.93 });
    assert.ok(result.ok);
    assert.equal(result.value.stoppedBy, 'voltage_limit');
    assert.equal(result.value.points.length, 1);
    assert.equal(result.value.maxPower, 100);
  });

  it('runs to the maximum scale on a light load', async () => {
    const result = await generator.generate({ ...unityCase, base_power: 10 });
    assert.ok(result.ok);
    assert.equal(result.value.stoppedBy, 'max_scale');
    assert.equal(result.value.points.length, 5);
    assert.equal(result.value.maxPower, 30);
  });

  it('reports non-convergence when the base load has no solution', async () => {
    const result = await generator.generate({ ...unityCase, base_power: 1000 });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.reason, 'non_convergence');
  });

  it('refuses a zero base load as invalid configuration', async () => {
    const result = await generator.generate({ ...unityCase, base_power: 0 });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.reason, 'invalid_configuration');
  });

  it('refuses a sweep finer than the point limit before computing it', async () => {
    const result = await generator.generate({ ...unityCase, step_size: 0.0009765625, max_scale: 10 });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.error.reason, 'invalid_configuration');
    assert.equal(
      result.error.message,
      'step_size 0.0009765625 up to max_scale 10 needs 9217 points, above the limit of 5000 sweep points; ' +
        'use a step_size of at least 0.0019'
    );
  });

  it('traces the finest allowed step within the point limit', async () => {
    const result = await generator.generate({ ...unityCase, step_size: 0.001 });
    assert.ok(result.ok);
    assert.equal(result.value.stoppedBy, 'nose');
    assert.equal(result.value.points.length, 1001);
    assert.ok(result.value.points.length <= MAX_SWEEP_POINTS);
  });

  it('lets a capacitive load reach further than an inductive one', async () => {
    const base = { ...unityCase, power_factor: 0.9, max_scale: 10 };
    const inductive = await generator.generate({ ...base, load_type: 'inductive' });
    const capacitive = await generator.generate({ ...base, load_type: 'capacitive' });
    assert.ok(inductive.ok && capacitive.ok);
    assert.ok(capacitive.value.maxPower > inductive.value.maxPower);
  });

  it('weakens the equivalent for buses further down a group', () => {
    close(busReactance({ ...unityCase, monitored_bus: 3 }), 0.275, 1e-12);
    close(busReactance({ ...unityCase, monitored_bus: 11 }), 0.25, 1e-12);
  });
});
