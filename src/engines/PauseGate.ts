/**
 * Cerrojo de pausa basado en promesas: el worker espera en wait() mientras la tarea
 * está en pausa y despierta con resume() o con la señal de cancelación, sin sondeo.
 *
 * @module engines/PauseGate
 */

export class PauseGate {
  private paused = false;
  private waiters: Array<() => void> = [];

  get isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  /**
   * Resuelve en cuanto la puerta esté abierta o `signal` aborte. No rechaza nunca:
   * quien espera comprueba `signal.aborted` al despertar.
   */
  wait(signal: AbortSignal): Promise<void> {
    if (!this.paused || signal.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      const wake = (): void => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter(waiter => waiter !== wake);
        resolve();
      };
      this.waiters.push(wake);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

export default PauseGate;
