import { describe, it, expect } from 'vitest';
import { aggregateTextLatency, commonMetricFamilies, familySuffix } from '../scorer/latency-aggregator';
import { instanceFromRecord } from '../instances/instance-table';
import type { Instance, MetricsMap } from '../types/instance';

function instanceWith(index: number, metrics: MetricsMap): Instance {
  return instanceFromRecord({
    index,
    sourceType: 'text',
    targetType: 'text',
    reference: 'r',
    prediction: 'p',
    predictionLength: 1,
    delays: [1],
    elapsed: [],
    durations: [],
    sourceLength: 1,
    finished: true,
    metrics,
  });
}

describe('latency aggregation', () => {
  it('maps metric families to report suffixes', () => {
    expect(familySuffix('latency')).toBe('');
    expect(familySuffix('latency_ca')).toBe('_CA');
    expect(familySuffix('latency_text_w_time')).toBe(' (Time in ms)');
    expect(familySuffix('custom')).toBe('_custom');
  });

  it('averages every family present in all instances', () => {
    const instances = [
      instanceWith(0, {
        latency: { AL: 1, AP: 0.5, DAL: 2 },
        latency_ca: { AL: 3, AP: 0.7, DAL: 4 },
      }),
      instanceWith(1, {
        latency: { AL: 3, AP: 1, DAL: 4 },
        latency_ca: { AL: 5, AP: 0.9, DAL: 6 },
      }),
    ];

    const report = aggregateTextLatency(instances);

    expect(Object.keys(report)).toEqual(['AL', 'AL_CA', 'AP', 'AP_CA', 'DAL', 'DAL_CA']);
    expect(report.AL).toBe(2);
    expect(report.AL_CA).toBe(4);
    expect(report.AP).toBe(0.75);
    expect(report.AP_CA).toBeCloseTo(0.8, 10);
    expect(report.DAL).toBe(3);
    expect(report.DAL_CA).toBe(5);
  });

  it('omits a family missing from any instance', () => {
    const instances = [
      instanceWith(0, { latency: { AL: 1, AP: 1, DAL: 1 }, latency_ca: { AL: 9, AP: 9, DAL: 9 } }),
      instanceWith(1, { latency: { AL: 2, AP: 1, DAL: 2 } }),
    ];

    expect(commonMetricFamilies(instances)).toEqual(['latency']);
    expect(aggregateTextLatency(instances)).toEqual({ AL: 1.5, AP: 1, DAL: 1.5 });
  });

  it('weights every instance equally regardless of length', () => {
    const instances = [
      instanceWith(0, { latency: { AL: 10, AP: 1, DAL: 10 } }),
      instanceWith(1, { latency: { AL: 0, AP: 0, DAL: 0 } }),
    ];
    expect(aggregateTextLatency(instances).AL).toBe(5);
  });

  it('orders unknown families after known ones', () => {
    const instances = [
      instanceWith(0, {
        zeta: { AL: 1, AP: 1, DAL: 1 },
        latency_text_w_time: { AL: 100, AP: 1, DAL: 100 },
        latency: { AL: 1, AP: 1, DAL: 1 },
      }),
    ];

    expect(commonMetricFamilies(instances)).toEqual(['latency', 'latency_text_w_time', 'zeta']);
    expect(aggregateTextLatency(instances)['AL (Time in ms)']).toBe(100);
    expect(aggregateTextLatency(instances).AL_zeta).toBe(1);
  });

  it('returns an empty report for an empty shard', () => {
    expect(aggregateTextLatency([])).toEqual({});
  });
});
