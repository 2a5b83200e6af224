/**
 * concurrencia.test
 *
 * Responsabilidad: Mapa concurrente acotado con entrega en orden de envio.
 */
import { describe, expect, it } from 'vitest';
import { mapaOrdenadoConcurrente } from '../src/compartido/concurrencia/mapaOrdenado';

const esperar = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function recolectar<T>(flujo: AsyncIterable<T>) {
  const salida: T[] = [];
  for await (const valor of flujo) salida.push(valor);
  return salida;
}

describe('mapaOrdenadoConcurrente', () => {
  it('entrega en orden de envio y respeta el limite', async () => {
    let activas = 0;
    let maximo = 0;

    const salida = await recolectar(
      mapaOrdenadoConcurrente([30, 5, 20, 0, 10], 2, async (ms, indice) => {
        activas += 1;
        maximo = Math.max(maximo, activas);
        await esperar(ms);
        activas -= 1;
        return indice * 10;
      })
    );

    expect(salida).toEqual([0, 10, 20, 30, 40]);
    expect(maximo).toBe(2);
  });

  it('despacha nuevas tareas mientras la primera sigue pendiente', async () => {
    const iniciadas: number[] = [];
    let liberarPrimera: () => void = () => undefined;
    const primera = new Promise<void>((resolve) => {
      liberarPrimera = resolve;
    });

    const resultado = recolectar(
      mapaOrdenadoConcurrente([0, 1, 2, 3], 2, async (valor) => {
        iniciadas.push(valor);
        if (valor === 0) await primera;
        return valor;
      })
    );
    await esperar(20);

    expect(iniciadas).toEqual([0, 1, 2, 3]);
    liberarPrimera();
    expect(await resultado).toEqual([0, 1, 2, 3]);
  });

  it('entrega el rechazo de una tarea en su turno', async () => {
    const vistos: number[] = [];

    await expect(
      (async () => {
        for await (const valor of mapaOrdenadoConcurrente([1, 2, 3], 2, async (x) => {
          if (x === 2) throw new Error('falla');
          return x;
        })) {
          vistos.push(valor);
        }
      })()
    ).rejects.toThrow('falla');
    expect(vistos).toEqual([1]);
  });

  it('no produce nada para una entrada vacia', async () => {
    expect(await recolectar(mapaOrdenadoConcurrente([], 4, async () => 1))).toEqual([]);
  });
});
