/**
 * Velocidad de transferencia y ETA por tarea usando una ventana deslizante.
 *
 * Cada muestra guarda (timestamp, bytes/s instantáneos). En cada inserción se descartan
 * las muestras anteriores a `now - windowMs`. speed() es la media aritmética de las
 * muestras retenidas (no una integral ponderada en el tiempo) y vale 0 con menos de 2.
 *
 * @module engines/SpeedEstimator
 */

export interface SpeedSample {
  /** Epoch ms. */
  timestamp: number;
  bytesPerSec: number;
}

/** Tope de muestras retenidas aunque la ventana sea muy larga. */
const MAX_SAMPLES = 1000;

export class SpeedEstimator {
  private samples: SpeedSample[] = [];
  private readonly windowMs: number;

  constructor(windowMs = 5000) {
    this.windowMs = windowMs;
  }

  /**
   * Registra `deltaBytes` transferidos en `deltaSeconds`. Sin tiempo transcurrido
   * no hay tasa que calcular y la muestra se ignora.
   */
  sample(now: number, deltaBytes: number, deltaSeconds: number): void {
    if (!(deltaSeconds > 0)) return;

    this.samples.push({ timestamp: now, bytesPerSec: Math.max(0, deltaBytes) / deltaSeconds });

    const cutoff = now - this.windowMs;
    let firstKept = 0;
    while (firstKept < this.samples.length && this.samples[firstKept].timestamp <= cutoff) {
      firstKept++;
    }
    if (firstKept > 0) {
      this.samples.splice(0, firstKept);
    }
    if (this.samples.length > MAX_SAMPLES) {
      this.samples.splice(0, this.samples.length - MAX_SAMPLES);
    }
  }

  /** Bytes/s suavizados; 0 con menos de 2 muestras en la ventana. */
  speed(): number {
    if (this.samples.length < 2) return 0;
    let sum = 0;
    for (const entry of this.samples) {
      sum += entry.bytesPerSec;
    }
    return sum / this.samples.length;
  }

  /** Segundos restantes, o null si la velocidad es 0 o el total es desconocido. */
  eta(totalSize: number, downloadedSize: number): number | null {
    const speed = this.speed();
    if (speed <= 0 || totalSize <= 0) return null;
    return Math.max(0, totalSize - downloadedSize) / speed;
  }

  sampleCount(): number {
    return this.samples.length;
  }

  reset(): void {
    this.samples = [];
  }
}

export default SpeedEstimator;
