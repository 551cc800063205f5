/**
 * @fileoverview Unit tests for TraceRecorder
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { TraceRecorder } from './tracer.js';
import { createUniqueId } from '../types/index.js';
import type { UniqueId } from '../types/index.js';

describe('TraceRecorder', () => {
  let pursuitId: UniqueId;
  let recorder: TraceRecorder<string, number, number, string>;

  beforeEach(() => {
    pursuitId = createUniqueId(uuidv4());
    recorder = new TraceRecorder(pursuitId);
  });

  describe('iterations', () => {
    it('should commit an iteration with everything set on it', () => {
      recorder.startIteration(1);
      recorder.setPlan({ actionToken: 'go' });
      recorder.setActionResult(3);
      recorder.setObservation(4);
      recorder.setReflection({ goalAchieved: false, shouldAdjustStrategy: true, learnings: 'slow' });
      recorder.recordDuration('plan', 1.5);
      recorder.commitIteration();

      const trace = recorder.finalize();
      expect(trace.records).toEqual([{
        iteration: 1,
        plan: { actionToken: 'go' },
        actionResult: 3,
        observation: 4,
        reflection: { goalAchieved: false, shouldAdjustStrategy: true, learnings: 'slow' },
        durations: { plan: 1.5 },
      }]);
    });

    it('should leave unset outputs absent', () => {
      recorder.startIteration(1);
      recorder.setPlan({ actionToken: 'stop', shouldExit: true });
      recorder.commitIteration();

      const [record] = recorder.finalize().records;
      expect(record).not.toHaveProperty('actionResult');
      expect(record).not.toHaveProperty('observation');
      expect(record).not.toHaveProperty('reflection');
    });

    it('should commit the previous iteration when a new one starts', () => {
      recorder.startIteration(1);
      recorder.startIteration(2);

      expect(recorder.size()).toBe(1);
    });

    it('should refuse writes with no open iteration', () => {
      expect(() => recorder.setObservation(1)).toThrow('No iteration is open');
    });
  });

  describe('finalize()', () => {
    it('should commit the open iteration and freeze the trace', () => {
      recorder.startIteration(1);
      recorder.setPlan({ actionToken: 'go' });

      const trace = recorder.finalize();

      expect(trace.pursuitId).toBe(pursuitId);
      expect(trace.records).toHaveLength(1);
      expect(trace.endedAt).toBeGreaterThanOrEqual(trace.startedAt);
      expect(Object.isFrozen(trace.records)).toBe(true);
      expect(Object.isFrozen(trace.records[0]?.durations)).toBe(true);
      expect(recorder.isFinalized()).toBe(true);
    });

    it('should return the same trace when called again', () => {
      expect(recorder.finalize()).toBe(recorder.finalize());
    });

    it('should reject writes afterwards', () => {
      recorder.finalize();

      expect(() => recorder.startIteration(1)).toThrow(`Trace for pursuit ${pursuitId} is finalized`);
    });
  });
});
