/**
 * Mapa concurrente acotado que entrega resultados en orden de envio.
 *
 * Contrato:
 * - A lo sumo `concurrencia` tareas en ejecucion; al terminar una se despacha
 *   la siguiente aunque su resultado aun espere turno en el buffer.
 * - Los resultados se guardan por indice de envio y se entregan estrictamente
 *   en ese orden, aunque las tareas terminen fuera de orden.
 * - Si una tarea rechaza, el rechazo se entrega en su turno (las tareas que
 *   no deben abortar el mapa tienen que resolver siempre).
 */
export type Tarea<TEntrada, TSalida> = (entrada: TEntrada, indice: number) => Promise<TSalida>;

type Ranura<T> = {
  promesa: Promise<T>;
  resolver: (valor: T) => void;
  rechazar: (error: unknown) => void;
};

function crearRanura<T>(): Ranura<T> {
  let resolver: (valor: T) => void = () => undefined;
  let rechazar: (error: unknown) => void = () => undefined;
  const promesa = new Promise<T>((res, rej) => {
    resolver = res;
    rechazar = rej;
  });
  // El rechazo se observa cuando llega su turno; aqui solo se evita el aviso global.
  promesa.catch(() => undefined);
  return { promesa, resolver, rechazar };
}

export async function* mapaOrdenadoConcurrente<TEntrada, TSalida>(
  entradas: readonly TEntrada[],
  concurrencia: number,
  tarea: Tarea<TEntrada, TSalida>
): AsyncGenerator<TSalida, void, undefined> {
  const limite = Math.max(1, Math.floor(concurrencia));
  const buffer = new Map<number, Ranura<TSalida>>();
  let siguienteEnvio = 0;
  let enEjecucion = 0;

  const ranura = (indice: number) => {
    let actual = buffer.get(indice);
    if (!actual) {
      actual = crearRanura<TSalida>();
      buffer.set(indice, actual);
    }
    return actual;
  };

  const despachar = () => {
    while (siguienteEnvio < entradas.length && enEjecucion < limite) {
      const indice = siguienteEnvio;
      siguienteEnvio += 1;
      enEjecucion += 1;
      const destino = ranura(indice);
      void Promise.resolve()
        .then(() => tarea(entradas[indice], indice))
        .then(destino.resolver, destino.rechazar)
        .finally(() => {
          enEjecucion -= 1;
          despachar();
        });
    }
  };

  despachar();
  for (let siguienteEntrega = 0; siguienteEntrega < entradas.length; siguienteEntrega += 1) {
    const { promesa } = ranura(siguienteEntrega);
    try {
      yield await promesa;
    } finally {
      buffer.delete(siguienteEntrega);
    }
  }
}
