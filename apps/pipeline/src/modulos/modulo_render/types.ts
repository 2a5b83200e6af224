import type { CategoriaFalloRender, ResultadoHerramienta } from '../../compartido/robustez/tiposRobustez';
import type { EtapaRender } from '../../compartido/observabilidad/metrics';

export const VARIANTE_BASICA = 'basic';
export const EXTENSION_RASTER = '.png';

// Clases de artefactos intermedios que no sobreviven a la corrida.
export const EXTENSIONES_INTERMEDIAS = ['.tex', '.pdf', '.log', '.aux'] as const;

export type ImagenRenderizada = {
  nombreImagen: string;
  variante: string;
};

// null = la formula no produjo imagen.
export type ResultadoRender = ImagenRenderizada[] | null;

/**
 * Destino de stdout/stderr de las herramientas externas. `'ignore'` descarta;
 * un numero es un descriptor abierto por el pool durante su vida.
 */
export type SalidaHerramientas = 'ignore' | number;

export type InvocacionHerramienta = {
  comando: string;
  argumentos: string[];
  cwd: string;
  timeoutMs: number;
  salida: SalidaHerramientas;
};

export interface EjecutorHerramienta {
  ejecutar(invocacion: InvocacionHerramienta): Promise<ResultadoHerramienta>;
}

/**
 * Verifica que el raster producido sea una imagen decodificable.
 */
export type VerificadorRaster = (rutaImagen: string) => Promise<void>;

export type OpcionesRender = {
  directorioImagenes: string;
  concurrencia: number;
  fraccionProgreso: number;
  timeoutHerramientaMs: number;
  comandoCompilador: string;
  comandoRasterizador: string;
  verificarRaster: boolean;
  registroHerramientas?: string;
  ejecutor?: EjecutorHerramienta;
  verificador?: VerificadorRaster;
};

export type ContextoPipelineRender = {
  formula: string;
  indice: number;
  directorioImagenes: string;
  comandoCompilador: string;
  comandoRasterizador: string;
  timeoutHerramientaMs: number;
  salida: SalidaHerramientas;
  ejecutor: EjecutorHerramienta;
  verificador?: VerificadorRaster;
  // Rutas creadas (o que pudo crear la herramienta) para limpiar por nombre exacto.
  manifiesto: Set<string>;
  direccion?: string;
  nombreBase?: string;
  omitida?: boolean;
  resultado?: ImagenRenderizada[];
};

export type ResultadoPipelineRender = {
  indice: number;
  exito: boolean;
  omitida: boolean;
  resultado: ResultadoRender;
  categoriaFallo?: CategoriaFalloRender;
  etapas: Array<{
    etapa: EtapaRender;
    duracionMs: number;
    exito: boolean;
  }>;
};

export type ProgresoRender = {
  procesadas: number;
  fallidas: number;
  total: number;
};
