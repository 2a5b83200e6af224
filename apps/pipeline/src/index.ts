/**
 * Punto de entrada del pipeline de dataset de formulas.
 *
 * - `<archivo_formulas>`: genera imagenes, indice y lista de formulas.
 * - `<indice> <archivo_formulas> <directorio_imagenes>`: valida un dataset existente.
 * - Cualquier otra cantidad de argumentos imprime el uso.
 */
import { generarDataset } from './modulos/modulo_dataset/servicioGeneracionDataset';
import { describirReporte, validarDataset } from './modulos/modulo_dataset/validadorConsistencia';
import { logError } from './infraestructura/logging/logger';

export const USO = [
  'Uso:',
  '  generar: pipeline <archivo_formulas>',
  '  validar: pipeline <indice_dataset> <archivo_formulas> <directorio_imagenes>'
].join('\n');

type Escritor = (linea: string) => void;

/**
 * Despacha por aridad. La validacion solo informa; el codigo de salida no
 * depende de sus hallazgos.
 */
export async function ejecutarCli(argumentos: readonly string[], escribir: Escritor = (l) => console.log(l)): Promise<number> {
  const [primero, segundo, tercero] = argumentos;
  if (argumentos.length === 1 && primero !== undefined) {
    await generarDataset(primero);
    return 0;
  }
  if (argumentos.length === 3 && primero !== undefined && segundo !== undefined && tercero !== undefined) {
    const reporte = await validarDataset(primero, segundo, tercero);
    for (const linea of describirReporte(reporte)) escribir(linea);
    return 0;
  }
  escribir(USO);
  return 0;
}

async function iniciar() {
  process.exitCode = await ejecutarCli(process.argv.slice(2));
}

if (require.main === module) {
  iniciar().catch((error) => {
    logError('Error al ejecutar el pipeline de formulas', error);
    process.exit(1);
  });
}
