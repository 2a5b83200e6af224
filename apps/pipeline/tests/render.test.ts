/**
 * render.test
 *
 * Responsabilidad: Pool de render y pipeline por formula con herramientas falsas.
 * Limites: No invoca pdflatex ni pdftoppm; el ejecutor falso escribe los artefactos.
 */
import { promises as fs } from 'fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { obtenerResumenRender, reiniciarMetricas } from '../src/compartido/observabilidad/metrics';
import { CategoriaFalloRender } from '../src/compartido/robustez/tiposRobustez';
import { calcularDireccion } from '../src/modulos/modulo_render/direccionContenido';
import { ejecutarPipelineRender } from '../src/modulos/modulo_render/pipeline/ejecutorPipelineRender';
import {
  calcularPasoProgreso,
  purgarIntermedios,
  renderizarFormulas,
  type ParametrosPool
} from '../src/modulos/modulo_render/poolRender';
import type { EjecutorHerramienta, ProgresoRender } from '../src/modulos/modulo_render/types';
import {
  COMPILADOR_FALSO,
  RASTERIZADOR_FALSO,
  crearEjecutorFalso,
  crearPngPrueba,
  type ComportamientoFalso
} from './utils/herramientasFalsas';

function nombreBase(formula: string) {
  return `${calcularDireccion(formula)}_basic`;
}

function parametros(directorio: string, ejecutor: EjecutorHerramienta, extra: Partial<ParametrosPool> = {}): ParametrosPool {
  return {
    directorioImagenes: directorio,
    concurrencia: 3,
    fraccionProgreso: 1,
    timeoutHerramientaMs: 1000,
    comandoCompilador: COMPILADOR_FALSO,
    comandoRasterizador: RASTERIZADOR_FALSO,
    verificarRaster: false,
    ejecutor,
    ...extra
  };
}

async function listar(directorio: string) {
  return (await fs.readdir(directorio)).sort();
}

describe('renderizarFormulas', () => {
  let directorio: string;

  beforeEach(async () => {
    reiniciarMetricas();
    directorio = await fs.mkdtemp(path.join(os.tmpdir(), 'render-'));
  });

  afterEach(async () => {
    await fs.rm(directorio, { recursive: true, force: true });
  });

  it('entrega resultados en el orden de entrada aunque terminen desordenados', async () => {
    const formulas = ['\\alpha + \\beta', '\\sum_{i=0}^{n} i', '\\frac{1}{2}'];
    const bases = formulas.map(nombreBase);
    const retrasos = new Map([
      [bases[0], 40],
      [bases[1], 0],
      [bases[2], 15]
    ]);
    const { ejecutor, invocaciones } = crearEjecutorFalso({ retrasoMs: (base) => retrasos.get(base) ?? 0 });

    const resultados = await renderizarFormulas(formulas, parametros(directorio, ejecutor));

    expect(resultados).toEqual(bases.map((base) => [{ nombreImagen: base, variante: 'basic' }]));
    expect(invocaciones).toHaveLength(6);
    expect(await listar(directorio)).toEqual(bases.map((base) => `${base}.png`).sort());
  });

  it('invoca las herramientas con los argumentos esperados', async () => {
    const formula = 'x^2 + y^2 = z^2';
    const base = nombreBase(formula);
    const { ejecutor, invocaciones } = crearEjecutorFalso();

    await renderizarFormulas([formula], parametros(directorio, ejecutor));

    expect(invocaciones.map((invocacion) => [invocacion.comando, invocacion.argumentos])).toEqual([
      [COMPILADOR_FALSO, ['-interaction=nonstopmode', '-halt-on-error', `${base}.tex`]],
      [RASTERIZADOR_FALSO, [`${base}.pdf`, base, '-png', '-singlefile']]
    ]);
    expect(invocaciones[0]?.cwd).toBe(path.resolve(directorio));
    expect(invocaciones[0]?.salida).toBe('ignore');
  });

  it('aisla cada falla, la categoriza y borra sus artefactos', async () => {
    const comportamientos: ComportamientoFalso[] = [
      'ok',
      'falla_compilacion',
      'ambigua',
      'tiempo_agotado',
      'falla_rasterizado',
      'sin_salida'
    ];
    const formulas = comportamientos.map((comportamiento) => `\\text{${comportamiento}}`);
    const porBase = new Map(formulas.map((formula, i) => [nombreBase(formula), comportamientos[i] ?? 'ok']));
    const { ejecutor } = crearEjecutorFalso({ comportamiento: (base) => porBase.get(base) ?? 'ok' });

    const resultados = await renderizarFormulas(formulas, parametros(directorio, ejecutor));

    expect(resultados).toEqual([[{ nombreImagen: nombreBase(formulas[0] ?? ''), variante: 'basic' }], null, null, null, null, null]);
    expect(await listar(directorio)).toEqual([`${nombreBase(formulas[0] ?? '')}.png`]);
    expect(obtenerResumenRender().porDesenlace).toEqual({
      renderizada: 1,
      compilacion: 1,
      salida_ambigua: 1,
      tiempo_agotado: 1,
      rasterizado: 2
    });
  });

  it('renombra la unica pagina numerada al nombre esperado', async () => {
    const formula = '\\int_0^1 x\\,dx';
    const base = nombreBase(formula);
    const { ejecutor } = crearEjecutorFalso({ comportamiento: () => 'paginada' });

    const resultados = await renderizarFormulas([formula], parametros(directorio, ejecutor));

    expect(resultados).toEqual([[{ nombreImagen: base, variante: 'basic' }]]);
    expect(await listar(directorio)).toEqual([`${base}.png`]);
  });

  it('omite sin invocar herramientas las formulas ya renderizadas', async () => {
    const formulas = ['a + b = c', 'e^{i\\pi} + 1 = 0'];
    const primera = crearEjecutorFalso();
    const resultadosIniciales = await renderizarFormulas(formulas, parametros(directorio, primera.ejecutor));
    reiniciarMetricas();

    const segunda = crearEjecutorFalso();
    const resultados = await renderizarFormulas(formulas, parametros(directorio, segunda.ejecutor));

    expect(segunda.invocaciones).toHaveLength(0);
    expect(resultados).toEqual(resultadosIniciales);
    expect(obtenerResumenRender().porDesenlace).toEqual({ omitida: 2 });
  });

  it('trata formulas que solo difieren en % iniciales como la misma imagen', async () => {
    const { ejecutor, invocaciones } = crearEjecutorFalso();
    await renderizarFormulas(['\\sqrt{2}'], parametros(directorio, ejecutor));

    const resultados = await renderizarFormulas(['%\\sqrt{2}'], parametros(directorio, ejecutor));

    expect(invocaciones).toHaveLength(2);
    expect(resultados).toEqual([[{ nombreImagen: nombreBase('\\sqrt{2}'), variante: 'basic' }]]);
  });

  it('renderiza una sola vez las formulas que comparten direccion', async () => {
    const formula = '\\sqrt{2}+\\pi';
    const base = nombreBase(formula);
    const interno = crearEjecutorFalso();
    let rasterizados = 0;
    // Un segundo rasterizado de la misma direccion fallaria y borraria el png del primero.
    const ejecutor: EjecutorHerramienta = {
      async ejecutar(invocacion) {
        if (invocacion.comando !== RASTERIZADOR_FALSO) return interno.ejecutor.ejecutar(invocacion);
        rasterizados += 1;
        if (rasterizados === 1) return interno.ejecutor.ejecutar(invocacion);
        await new Promise((resolve) => setTimeout(resolve, 50));
        return { ok: false, codigo: 1, tiempoAgotado: false, duracionMs: 50 };
      }
    };

    const resultados = await renderizarFormulas(
      [formula, `%${formula}`, formula],
      parametros(directorio, ejecutor, { concurrencia: 3 })
    );

    const esperado = [{ nombreImagen: base, variante: 'basic' }];
    expect(resultados).toEqual([esperado, esperado, esperado]);
    expect(rasterizados).toBe(1);
    expect(await listar(directorio)).toEqual([`${base}.png`]);
    expect(obtenerResumenRender().porDesenlace).toEqual({ renderizada: 1, omitida: 2 });
  });

  it('propaga la falla de una direccion a sus gemelas', async () => {
    const formula = '\\frac{a}{b}';
    const { ejecutor, invocaciones } = crearEjecutorFalso({ comportamiento: () => 'falla_rasterizado' });

    const resultados = await renderizarFormulas([formula, formula], parametros(directorio, ejecutor, { concurrencia: 2 }));

    expect(resultados).toEqual([null, null]);
    expect(invocaciones).toHaveLength(2);
    expect(await listar(directorio)).toEqual([]);
    expect(obtenerResumenRender().porDesenlace).toEqual({ rasterizado: 2 });
  });

  it('descarta rasters que sharp no puede decodificar', async () => {
    const formula = '\\lim_{x \\to 0} x';
    const { ejecutor } = crearEjecutorFalso();

    const resultados = await renderizarFormulas([formula], parametros(directorio, ejecutor, { verificarRaster: true }));

    expect(resultados).toEqual([null]);
    expect(await listar(directorio)).toEqual([]);
    expect(obtenerResumenRender().porDesenlace).toEqual({ rasterizado: 1 });
  });

  it('acepta rasters validos al verificar con sharp', async () => {
    const formula = '\\lim_{x \\to \\infty} 1/x';
    const { ejecutor } = crearEjecutorFalso({ png: await crearPngPrueba() });

    const resultados = await renderizarFormulas([formula], parametros(directorio, ejecutor, { verificarRaster: true }));

    expect(resultados).toEqual([[{ nombreImagen: nombreBase(formula), variante: 'basic' }]]);
  });

  it('reporta progreso monotono segun la fraccion configurada', async () => {
    const formulas = ['p_1', 'p_2', 'p_3', 'p_4'];
    const fallida = nombreBase('p_2');
    const { ejecutor } = crearEjecutorFalso({
      comportamiento: (base) => (base === fallida ? 'falla_compilacion' : 'ok')
    });
    const progreso: ProgresoRender[] = [];

    await renderizarFormulas(
      formulas,
      parametros(directorio, ejecutor, { fraccionProgreso: 0.5, alProgreso: (p) => progreso.push(p) })
    );

    expect(progreso).toEqual([
      { procesadas: 2, fallidas: 1, total: 4 },
      { procesadas: 4, fallidas: 1, total: 4 }
    ]);
  });

  it('dirige la salida de las herramientas al registro configurado', async () => {
    const directorioRegistro = await fs.mkdtemp(path.join(os.tmpdir(), 'registro-'));
    const registro = path.join(directorioRegistro, 'herramientas.txt');
    const { ejecutor, invocaciones } = crearEjecutorFalso();

    try {
      await renderizarFormulas(['q_1'], parametros(directorio, ejecutor, { registroHerramientas: registro }));

      expect(invocaciones).toHaveLength(2);
      expect(invocaciones.every((invocacion) => typeof invocacion.salida === 'number')).toBe(true);
      expect((await fs.stat(registro)).isFile()).toBe(true);
    } finally {
      await fs.rm(directorioRegistro, { recursive: true, force: true });
    }
  });

  it('purga intermedios previos y conserva el resto', async () => {
    await Promise.all(
      ['viejo.aux', 'viejo.tex', 'viejo.log', 'viejo.pdf', 'notas.txt', 'previa.png'].map((nombre) =>
        fs.writeFile(path.join(directorio, nombre), 'x')
      )
    );
    const { ejecutor } = crearEjecutorFalso();

    const resultados = await renderizarFormulas([], parametros(directorio, ejecutor));

    expect(resultados).toEqual([]);
    expect(await listar(directorio)).toEqual(['notas.txt', 'previa.png']);
  });

  it('rechaza opciones invalidas antes de renderizar', async () => {
    const { ejecutor, invocaciones } = crearEjecutorFalso();

    await expect(renderizarFormulas(['r_1'], parametros(directorio, ejecutor, { concurrencia: 0 }))).rejects.toMatchObject({
      codigo: 'OPCIONES_RENDER_INVALIDAS'
    });
    expect(invocaciones).toHaveLength(0);
  });
});

describe('purgarIntermedios', () => {
  it('devuelve la cantidad de archivos borrados', async () => {
    const directorio = await fs.mkdtemp(path.join(os.tmpdir(), 'purga-'));
    try {
      await fs.writeFile(path.join(directorio, 'a.tex'), 'x');
      await fs.writeFile(path.join(directorio, 'a.png'), 'x');

      expect(await purgarIntermedios(directorio)).toBe(1);
    } finally {
      await fs.rm(directorio, { recursive: true, force: true });
    }
  });
});

describe('calcularPasoProgreso', () => {
  it('nunca baja de 1', () => {
    expect(calcularPasoProgreso(0, 0.0001)).toBe(1);
    expect(calcularPasoProgreso(10, 0.0001)).toBe(1);
    expect(calcularPasoProgreso(300_000, 0.0001)).toBe(30);
  });
});

describe('ejecutarPipelineRender', () => {
  let directorio: string;

  beforeEach(async () => {
    reiniciarMetricas();
    directorio = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
  });

  afterEach(async () => {
    await fs.rm(directorio, { recursive: true, force: true });
  });

  function contexto(ejecutor: EjecutorHerramienta) {
    return {
      formula: '\\beta',
      indice: 7,
      directorioImagenes: directorio,
      comandoCompilador: COMPILADOR_FALSO,
      comandoRasterizador: RASTERIZADOR_FALSO,
      timeoutHerramientaMs: 1000,
      salida: 'ignore' as const,
      ejecutor,
      manifiesto: new Set<string>()
    };
  }

  it('convierte un ejecutor que rechaza en falla interna sin propagar', async () => {
    const ejecutor: EjecutorHerramienta = {
      ejecutar: async () => {
        throw new Error('proceso sin permisos');
      }
    };

    const reporte = await ejecutarPipelineRender(contexto(ejecutor));

    expect(reporte).toMatchObject({ indice: 7, exito: false, resultado: null, categoriaFallo: CategoriaFalloRender.INTERNO });
    expect(reporte.etapas.map((etapa) => [etapa.etapa, etapa.exito])).toEqual([
      ['direccion', true],
      ['plantilla', true],
      ['compilacion', false]
    ]);
    expect(await listar(directorio)).toEqual([]);
  });

  it('reconoce un rechazo por timeout como tiempo agotado', async () => {
    const ejecutor: EjecutorHerramienta = {
      ejecutar: async () => {
        throw new Error('timeout esperando al proceso');
      }
    };

    const reporte = await ejecutarPipelineRender(contexto(ejecutor));

    expect(reporte.categoriaFallo).toBe(CategoriaFalloRender.TIEMPO_AGOTADO);
  });

  it('registra todas las etapas en una formula exitosa', async () => {
    const { ejecutor } = crearEjecutorFalso();

    const reporte = await ejecutarPipelineRender(contexto(ejecutor));

    expect(reporte.exito).toBe(true);
    expect(reporte.omitida).toBe(false);
    expect(reporte.etapas.map((etapa) => etapa.etapa)).toEqual([
      'direccion',
      'plantilla',
      'compilacion',
      'rasterizado',
      'salida',
      'verificacion'
    ]);
  });
});
