/**
 * Extrae formulas de un directorio de archivos `*.tar.gz` de fuentes LaTeX.
 *
 * Uso: extraer-formulas <directorio_archivos>
 * Escribe `formulas.txt` (unicas) y `formulas-mod.txt` (sin etiquetas, sin deduplicar)
 * en el directorio actual.
 */
import { configuracion } from '../src/configuracion';
import { logError } from '../src/infraestructura/logging/logger';
import { extraerCorpus } from '../src/modulos/modulo_extraccion/servicioExtraccion';

async function main() {
  const args = process.argv.slice(2);
  const directorio = args[0];
  if (args.length !== 1 || directorio === undefined) {
    console.log('Uso: extraer-formulas <directorio_archivos>');
    return;
  }

  const resumen = await extraerCorpus({
    directorio,
    archivoFormulas: 'formulas.txt',
    archivoFormulasNormalizadas: 'formulas-mod.txt',
    minLongitud: configuracion.minLongitudFormula,
    maxLongitud: configuracion.maxLongitudFormula
  });
  console.log(`Formulas detectadas: ${resumen.detectadas}`);
  console.log(`Formulas unicas: ${resumen.unicas}`);
}

main().catch((error) => {
  logError('Error al extraer formulas', error);
  process.exit(1);
});
