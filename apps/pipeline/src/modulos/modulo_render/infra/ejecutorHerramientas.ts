/**
 * Invocacion acotada en tiempo de las herramientas externas (compilador LaTeX,
 * rasterizador).
 *
 * Contrato:
 * - Nunca rechaza: codigo distinto de 0, error de arranque o tiempo agotado
 *   se reportan en `ResultadoHerramienta`.
 * - Al agotarse el tiempo se mata el proceso y se reporta codigo 124.
 */
import { spawn } from 'node:child_process';
import type { ResultadoHerramienta } from '../../../compartido/robustez/tiposRobustez';
import type { EjecutorHerramienta, InvocacionHerramienta } from '../types';

export const CODIGO_TIEMPO_AGOTADO = 124;

export function ejecutarHerramienta(invocacion: InvocacionHerramienta): Promise<ResultadoHerramienta> {
  const inicio = Date.now();
  return new Promise((resolve) => {
    let terminado = false;
    const terminar = (resultado: Omit<ResultadoHerramienta, 'duracionMs'>) => {
      if (terminado) return;
      terminado = true;
      clearTimeout(timeout);
      resolve({ ...resultado, duracionMs: Date.now() - inicio });
    };

    const proceso = spawn(invocacion.comando, invocacion.argumentos, {
      cwd: invocacion.cwd,
      stdio: ['ignore', invocacion.salida, invocacion.salida],
      windowsHide: true
    });

    const timeout = setTimeout(() => {
      proceso.kill('SIGKILL');
      terminar({ ok: false, codigo: CODIGO_TIEMPO_AGOTADO, tiempoAgotado: true, error: 'Tiempo agotado' });
    }, invocacion.timeoutMs);

    proceso.on('error', (error) => {
      terminar({ ok: false, codigo: 1, tiempoAgotado: false, error: error?.message || 'error' });
    });
    proceso.on('exit', (code, signal) => {
      const codigo = code ?? (signal ? 1 : 0);
      terminar({ ok: codigo === 0, codigo, tiempoAgotado: false });
    });
  });
}

export const ejecutorProcesos: EjecutorHerramienta = {
  ejecutar: ejecutarHerramienta
};
