/**
 * Configuración por defecto del gestor de transferencias (valores de runtime).
 *
 * Aquí se definen tamaño de chunk, intervalos de progreso, ventana de velocidad,
 * timeouts y reintentos. Cada TaskRegistry puede sobrescribir cualquiera de estos
 * valores al construirse (ver TaskRegistryOptions en engines/TaskRegistry).
 *
 * @module config
 */

export interface TransfersConfig {
  /** Tamaño de cada chunk procesado por el worker (bytes). */
  chunkSize: number;
  /** Intervalo mínimo entre muestras de velocidad y eventos `progress` (ms). */
  progressIntervalMs: number;
  /** Ventana deslizante del SpeedEstimator (ms). */
  speedWindowMs: number;
  /** Reintentos automáticos + manuales por tarea. */
  maxRetries: number;
}

export interface NetworkConfig {
  /** Timeout de conexión/respuesta y de lectura de cada chunk (ms). */
  requestTimeoutMs: number;
  /** Espera antes de un reintento automático (ms). */
  retryDelayMs: number;
  /** Tope del backoff exponencial (ms). */
  maxRetryDelayMs: number;
  maxRedirects: number;
  /** Los 4xx definitivos fallan sin consumir reintentos. */
  failFastOnClientError: boolean;
}

export interface AppConfig {
  transfers: TransfersConfig;
  network: NetworkConfig;
}

const config: AppConfig = {
  transfers: {
    chunkSize: 8 * 1024,
    progressIntervalMs: 100,
    speedWindowMs: 5000,
    maxRetries: 3,
  },

  network: {
    requestTimeoutMs: 30000,
    retryDelayMs: 2000,
    maxRetryDelayMs: 30000,
    maxRedirects: 5,
    failFastOnClientError: false,
  },
};

export default config;
