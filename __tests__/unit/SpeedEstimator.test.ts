/**
 * Tests unitarios para src/engines/SpeedEstimator.ts
 */
import { SpeedEstimator } from '../../src/engines/SpeedEstimator';

describe('SpeedEstimator', () => {
  let estimator: SpeedEstimator;

  beforeEach(() => {
    estimator = new SpeedEstimator(5000);
  });

  describe('sample', () => {
    it('debe ignorar muestras sin tiempo transcurrido', () => {
      estimator.sample(1000, 500, 0);
      estimator.sample(1000, 500, -1);
      expect(estimator.sampleCount()).toBe(0);
    });

    it('debe tratar deltas de bytes negativos como 0', () => {
      estimator.sample(1000, -100, 1);
      estimator.sample(2000, 1000, 1);
      expect(estimator.speed()).toBe(500);
    });

    it('debe descartar muestras anteriores a la ventana', () => {
      estimator.sample(1000, 1000, 1);
      estimator.sample(3000, 2000, 1);
      estimator.sample(7000, 4000, 1);
      expect(estimator.sampleCount()).toBe(2);
      expect(estimator.speed()).toBe(3000);
    });

    it('debe acotar el número de muestras retenidas', () => {
      const wide = new SpeedEstimator(10_000_000);
      for (let i = 1; i <= 1005; i++) {
        wide.sample(i, 100, 1);
      }
      expect(wide.sampleCount()).toBe(1000);
    });
  });

  describe('speed', () => {
    it('debe devolver 0 sin muestras', () => {
      expect(estimator.speed()).toBe(0);
    });

    it('debe devolver 0 con una sola muestra', () => {
      estimator.sample(1000, 4096, 1);
      expect(estimator.speed()).toBe(0);
    });

    it('debe calcular la media aritmética de las tasas', () => {
      estimator.sample(1000, 1000, 1);
      estimator.sample(2000, 3000, 1);
      expect(estimator.speed()).toBe(2000);
    });

    it('debe convertir bytes por intervalo a bytes/s', () => {
      estimator.sample(100, 100, 0.1);
      estimator.sample(200, 300, 0.1);
      expect(estimator.speed()).toBeCloseTo(2000, 6);
    });
  });

  describe('eta', () => {
    it('debe devolver los segundos restantes a la velocidad actual', () => {
      estimator.sample(1000, 1000, 1);
      estimator.sample(2000, 3000, 1);
      expect(estimator.eta(10000, 4000)).toBe(3);
    });

    it('debe devolver null con tamaño total desconocido', () => {
      estimator.sample(1000, 1000, 1);
      estimator.sample(2000, 3000, 1);
      expect(estimator.eta(0, 4000)).toBeNull();
    });

    it('debe devolver null sin velocidad', () => {
      expect(estimator.eta(10000, 4000)).toBeNull();
    });

    it('no debe devolver valores negativos', () => {
      estimator.sample(1000, 1000, 1);
      estimator.sample(2000, 1000, 1);
      expect(estimator.eta(1000, 5000)).toBe(0);
    });
  });

  describe('reset', () => {
    it('debe vaciar la ventana', () => {
      estimator.sample(1000, 1000, 1);
      estimator.sample(2000, 1000, 1);
      estimator.reset();
      expect(estimator.sampleCount()).toBe(0);
      expect(estimator.speed()).toBe(0);
    });
  });
});
