/**
 * Tests unitarios para core/engines/SpeedTracker.ts
 */
import { SpeedTracker } from '../../core/engines/SpeedTracker';

describe('SpeedTracker', () => {
  let now: number;
  let tracker: SpeedTracker;

  beforeEach(() => {
    now = 0;
    tracker = new SpeedTracker(0.3, 0.1, () => now);
  });

  it('debe devolver null para jobs sin tracking', () => {
    expect(tracker.update('x', 10, 100)).toBeNull();
  });

  it('debe calcular velocidad EMA y tiempo restante', () => {
    tracker.startTracking('job', 0);
    now = 1000;
    expect(tracker.update('job', 1000, 3000)).toEqual({ speedBytesPerSec: 1000, remainingSeconds: 2 });

    now = 2000;
    const result = tracker.update('job', 3000, 3000);
    expect(result?.speedBytesPerSec).toBeCloseTo(1300);
    expect(result?.remainingSeconds).toBe(0);
  });

  it('no debe contar los bytes previos a la reanudación como velocidad', () => {
    tracker.startTracking('job', 500000);
    now = 1000;
    expect(tracker.update('job', 501000, null)).toEqual({ speedBytesPerSec: 1000, remainingSeconds: null });
  });

  it('debe reiniciar la estimación cuando los bytes retroceden', () => {
    tracker.startTracking('job', 0);
    now = 1000;
    tracker.update('job', 800, 1000);
    now = 1500;
    expect(tracker.update('job', 0, 1000)).toEqual({ speedBytesPerSec: 0, remainingSeconds: null });
  });

  it('stopTracking y clear deben olvidar las entradas', () => {
    tracker.startTracking('a');
    tracker.startTracking('b');
    tracker.stopTracking('a');
    expect(tracker.isTracking('a')).toBe(false);
    expect(tracker.isTracking('b')).toBe(true);
    tracker.clear();
    expect(tracker.isTracking('b')).toBe(false);
  });
});
