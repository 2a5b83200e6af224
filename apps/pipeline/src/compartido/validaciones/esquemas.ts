// Esquemas Zod reutilizables (contratos de artefactos y opciones).
import { z } from 'zod';

// Fila del indice: `<id> <nombreImagen> <variante>` separados por un espacio.
export const esquemaFilaIndice = z
  .string()
  .transform((linea) => linea.split(' '))
  .pipe(
    z.tuple([
      z.string().regex(/^\d+$/).transform(Number),
      z.string().trim().min(1),
      z.string().trim().min(1)
    ])
  )
  .transform(([id, nombreImagen, variante]) => ({ id, nombreImagen, variante }));

export type FilaIndice = z.infer<typeof esquemaFilaIndice>;

export const esquemaOpcionesRender = z.object({
  directorioImagenes: z.string().trim().min(1),
  concurrencia: z.number().int().min(1).max(512),
  fraccionProgreso: z.number().positive().max(1),
  timeoutHerramientaMs: z.number().int().min(1),
  comandoCompilador: z.string().trim().min(1),
  comandoRasterizador: z.string().trim().min(1),
  verificarRaster: z.boolean(),
  registroHerramientas: z.string().optional()
});
