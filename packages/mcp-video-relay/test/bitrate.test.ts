import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decideBitrate, maxBitrateFor } from '../src/pipeline/bitrate.ts';
import { QualityDegradationError } from '../src/utils/errors.ts';

describe('maxBitrateFor', () => {
  it('converts the upload budget to kbps minus audio and overhead', () => {
    // 50 * 8000 / 60 = 6666.67; - 128 = 6538.67; * 0.97 = 6342.5
    assert.equal(maxBitrateFor(50, 60), 6342);
    // 50 * 8000 / 600 = 666.67; - 128 = 538.67; * 0.97 = 522.5
    assert.equal(maxBitrateFor(50, 600), 522);
  });

  it('never goes below zero for very long videos', () => {
    assert.equal(maxBitrateFor(50, 100_000), 0);
  });
});

describe('decideBitrate', () => {
  it('encodes unconstrained when the source is already under the cap', () => {
    const decision = decideBitrate({
      durationSeconds: 60,
      originalBitrateKbps: 1000,
      uploadLimitMb: 50,
      enableFallback: false,
    });
    assert.deepEqual(decision, { maxBitrateKbps: 6342, targetBitrateKbps: null, reduced: false });
  });

  it('rejects a reduction of more than 15% without fallback', () => {
    assert.throws(
      () =>
        decideBitrate({
          durationSeconds: 600,
          originalBitrateKbps: 1000,
          uploadLimitMb: 50,
          enableFallback: false,
        }),
      (error: unknown) => {
        assert.ok(error instanceof QualityDegradationError);
        assert.equal(error.maxBitrateKbps, 522);
        assert.equal(error.originalBitrateKbps, 1000);
        assert.equal(error.code, 'QUALITY_DEGRADATION');
        return true;
      },
    );
  });

  it('accepts the same reduction with fallback enabled', () => {
    const decision = decideBitrate({
      durationSeconds: 600,
      originalBitrateKbps: 1000,
      uploadLimitMb: 50,
      enableFallback: true,
    });
    assert.deepEqual(decision, { maxBitrateKbps: 522, targetBitrateKbps: 522, reduced: true });
  });

  it('reduces without complaint when the loss stays within 15%', () => {
    const decision = decideBitrate({
      durationSeconds: 600,
      originalBitrateKbps: 600,
      uploadLimitMb: 50,
      enableFallback: false,
    });
    assert.deepEqual(decision, { maxBitrateKbps: 522, targetBitrateKbps: 522, reduced: true });
  });

  it('has no cap when the duration is unknown', () => {
    const decision = decideBitrate({
      durationSeconds: 0,
      originalBitrateKbps: 5000,
      uploadLimitMb: 50,
      enableFallback: false,
    });
    assert.deepEqual(decision, { maxBitrateKbps: null, targetBitrateKbps: null, reduced: false });
  });

  it('skips the quality check when the original bitrate is unknown', () => {
    const decision = decideBitrate({
      durationSeconds: 600,
      originalBitrateKbps: 0,
      uploadLimitMb: 50,
      enableFallback: false,
    });
    assert.deepEqual(decision, { maxBitrateKbps: 522, targetBitrateKbps: null, reduced: false });
  });

  it('encodes unconstrained when the cap drops to zero', () => {
    const unknown = decideBitrate({
      durationSeconds: 100_000,
      originalBitrateKbps: 0,
      uploadLimitMb: 50,
      enableFallback: false,
    });
    assert.deepEqual(unknown, { maxBitrateKbps: 0, targetBitrateKbps: null, reduced: false });

    const withFallback = decideBitrate({
      durationSeconds: 100_000,
      originalBitrateKbps: 1000,
      uploadLimitMb: 50,
      enableFallback: true,
    });
    assert.deepEqual(withFallback, { maxBitrateKbps: 0, targetBitrateKbps: null, reduced: false });
  });

  it('still rejects a zero cap for a known bitrate without fallback', () => {
    assert.throws(
      () =>
        decideBitrate({
          durationSeconds: 100_000,
          originalBitrateKbps: 1000,
          uploadLimitMb: 50,
          enableFallback: false,
        }),
      QualityDegradationError,
    );
  });
});
