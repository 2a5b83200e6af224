/**
 * Pool de render: fan-out acotado de formulas hacia la cadena externa.
 *
 * Contrato:
 * - `resultados[i]` corresponde a `formulas[i]` sin importar el orden de termino.
 * - Las fallas por formula se aislan (resultado `null`); el pool nunca aborta
 *   por una formula.
 * - La salida de las herramientas va a un destino propio del pool: se descarta
 *   o se anexa a `registroHerramientas`, abierto y cerrado por el pool.
 * - Al terminar se purgan del directorio `.tex`, `.pdf`, `.log` y `.aux`.
 * - Formulas con la misma direccion comparten un solo render: la primera lo
 *   ejecuta y las demas reciben su resultado, asi nunca compiten por los
 *   mismos archivos.
 */
import { promises as fs } from 'fs';
import path from 'node:path';
import { mapaOrdenadoConcurrente } from '../../compartido/concurrencia/mapaOrdenado';
import { registrarPipelineRender } from '../../compartido/observabilidad/metrics';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { CategoriaFalloRender } from '../../compartido/robustez/tiposRobustez';
import { esquemaOpcionesRender } from '../../compartido/validaciones/esquemas';
import { log } from '../../infraestructura/logging/logger';
import { calcularDireccion } from './direccionContenido';
import { ejecutorProcesos } from './infra/ejecutorHerramientas';
import { verificarRasterSharp } from './infra/verificadorRaster';
import { ejecutarPipelineRender } from './pipeline/ejecutorPipelineRender';
import {
  EXTENSIONES_INTERMEDIAS,
  type ContextoPipelineRender,
  type OpcionesRender,
  type ProgresoRender,
  type ResultadoPipelineRender,
  type ResultadoRender,
  type SalidaHerramientas
} from './types';

export type ParametrosPool = OpcionesRender & {
  alProgreso?: (progreso: ProgresoRender) => void;
};

export function calcularPasoProgreso(total: number, fraccion: number): number {
  return Math.max(1, Math.floor(total * fraccion));
}

/**
 * Borra todo artefacto intermedio del directorio; los rasters son lo unico
 * que sobrevive a la corrida.
 */
export async function purgarIntermedios(directorio: string): Promise<number> {
  const extensiones = new Set<string>(EXTENSIONES_INTERMEDIAS);
  const nombres = await fs.readdir(directorio);
  let borrados = 0;
  for (const nombre of nombres) {
    if (!extensiones.has(path.extname(nombre))) continue;
    await fs.rm(path.join(directorio, nombre), { force: true });
    borrados += 1;
  }
  return borrados;
}

function direccionSegura(formula: string): string | undefined {
  try {
    return calcularDireccion(formula);
  } catch {
    // La etapa de direccion del pipeline reporta la falla.
    return undefined;
  }
}

/**
 * Ejecuta el pipeline una vez por direccion. Una formula gemela espera el
 * render en curso (o ya resuelto) y hereda su resultado con su propio indice.
 */
function crearRenderCoalescido(ejecutar: (contexto: ContextoPipelineRender) => Promise<ResultadoPipelineRender>) {
  const enCurso = new Map<string, Promise<ResultadoPipelineRender>>();

  return async (contexto: ContextoPipelineRender): Promise<ResultadoPipelineRender> => {
    const direccion = direccionSegura(contexto.formula);
    if (direccion === undefined) return ejecutar(contexto);

    const previo = enCurso.get(direccion);
    if (!previo) {
      const promesa = ejecutar(contexto);
      enCurso.set(direccion, promesa);
      return promesa;
    }

    const inicio = Date.now();
    const heredado = await previo;
    registrarPipelineRender(heredado.exito ? 'omitida' : heredado.categoriaFallo ?? CategoriaFalloRender.INTERNO, Date.now() - inicio);
    return {
      ...heredado,
      indice: contexto.indice,
      omitida: heredado.exito,
      resultado: heredado.resultado ? heredado.resultado.map((imagen) => ({ ...imagen })) : null,
      etapas: []
    };
  };
}

async function abrirSalidaHerramientas(
  registro?: string
): Promise<{ salida: SalidaHerramientas; cerrar: () => Promise<void> }> {
  if (!registro) {
    return { salida: 'ignore', cerrar: async () => undefined };
  }
  const manejador = await fs.open(registro, 'a');
  return { salida: manejador.fd, cerrar: () => manejador.close() };
}

export async function renderizarFormulas(formulas: readonly string[], parametros: ParametrosPool): Promise<ResultadoRender[]> {
  const validacion = esquemaOpcionesRender.safeParse({
    directorioImagenes: parametros.directorioImagenes,
    concurrencia: parametros.concurrencia,
    fraccionProgreso: parametros.fraccionProgreso,
    timeoutHerramientaMs: parametros.timeoutHerramientaMs,
    comandoCompilador: parametros.comandoCompilador,
    comandoRasterizador: parametros.comandoRasterizador,
    verificarRaster: parametros.verificarRaster,
    registroHerramientas: parametros.registroHerramientas
  });
  if (!validacion.success) {
    throw new ErrorAplicacion('OPCIONES_RENDER_INVALIDAS', 'Opciones de render invalidas', validacion.error.flatten());
  }
  const opciones = validacion.data;
  const directorioImagenes = path.resolve(opciones.directorioImagenes);
  const ejecutor = parametros.ejecutor ?? ejecutorProcesos;
  const verificador = opciones.verificarRaster ? parametros.verificador ?? verificarRasterSharp : undefined;

  const total = formulas.length;
  const paso = calcularPasoProgreso(total, opciones.fraccionProgreso);
  const resultados: ResultadoRender[] = [];
  let procesadas = 0;
  let fallidas = 0;

  const { salida, cerrar } = await abrirSalidaHerramientas(opciones.registroHerramientas);
  try {
    const renderizar = crearRenderCoalescido(ejecutarPipelineRender);
    const flujo = mapaOrdenadoConcurrente(formulas, opciones.concurrencia, (formula, indice) =>
      renderizar({
        formula,
        indice,
        directorioImagenes,
        comandoCompilador: opciones.comandoCompilador,
        comandoRasterizador: opciones.comandoRasterizador,
        timeoutHerramientaMs: opciones.timeoutHerramientaMs,
        salida,
        ejecutor,
        verificador,
        manifiesto: new Set<string>()
      })
    );

    for await (const reporte of flujo) {
      resultados.push(reporte.resultado);
      procesadas += 1;
      if (reporte.resultado === null) fallidas += 1;
      if (procesadas % paso === 0 || procesadas === total) {
        const progreso = { procesadas, fallidas, total };
        log('info', 'Progreso de render', progreso);
        parametros.alProgreso?.(progreso);
      }
    }
  } finally {
    await cerrar();
  }

  const borrados = await purgarIntermedios(directorioImagenes);
  log('info', 'Artefactos intermedios purgados', { borrados });
  return resultados;
}
