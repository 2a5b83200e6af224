/**
 * Error por formula con categoria y auditoria.
 *
 * Contrato: todo lo que se lanza dentro del pipeline de una formula se convierte
 * en `ErrorRender` antes de contabilizarse; el pool nunca lo propaga.
 */
import { CategoriaFalloRender, type FalloRender } from './tiposRobustez';

export class ErrorRender extends Error implements Omit<FalloRender, 'name'> {
  categoria: CategoriaFalloRender;
  auditoria: string;
  duracionMs: number;
  direccion?: string;

  constructor(
    message: string,
    categoria?: CategoriaFalloRender,
    auditoria?: string,
    duracionMs?: number,
    direccion?: string
  ) {
    super(message);
    this.name = 'ErrorRender';
    this.categoria = categoria ?? CategoriaFalloRender.INTERNO;
    this.auditoria = auditoria ?? '';
    this.duracionMs = duracionMs ?? 0;
    this.direccion = direccion;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Normaliza cualquier valor lanzado a ErrorRender.
 */
export function normalizarErrorRender(err: unknown, direccion?: string): ErrorRender {
  if (err instanceof ErrorRender) {
    if (!err.direccion && direccion) err.direccion = direccion;
    return err;
  }

  if (err instanceof Error) {
    const categoria = /timeout|tiempo agotado/i.test(err.message)
      ? CategoriaFalloRender.TIEMPO_AGOTADO
      : CategoriaFalloRender.INTERNO;
    return new ErrorRender(err.message, categoria, err.stack || '', 0, direccion);
  }

  return new ErrorRender('Error desconocido en render', CategoriaFalloRender.INTERNO, JSON.stringify(err) ?? '', 0, direccion);
}
