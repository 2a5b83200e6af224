/**
 * logger
 *
 * Responsabilidad: Logging estructurado (una linea JSON por evento) del pipeline.
 * Limites: `LOG_NIVEL` filtra por severidad minima; `silencio` apaga todo.
 */
export type NivelLog = 'info' | 'ok' | 'warn' | 'error';

type Meta = Record<string, unknown>;

const servicio = 'pipeline-formulas';
const env = process.env.NODE_ENV ?? 'development';

const PRIORIDAD: Record<NivelLog, number> = {
  info: 10,
  ok: 20,
  warn: 30,
  error: 40
};

function esNivelLog(valor: string): valor is NivelLog {
  return Object.prototype.hasOwnProperty.call(PRIORIDAD, valor);
}

function nivelMinimo(): number {
  const raw = String(process.env.LOG_NIVEL ?? '').trim().toLowerCase();
  if (raw === 'silencio') return Number.POSITIVE_INFINITY;
  if (esNivelLog(raw)) return PRIORIDAD[raw];
  return PRIORIDAD.info;
}

function serializarError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }
  return { value: String(error) };
}

function nivelEstandar(level: NivelLog): 'info' | 'warn' | 'error' {
  if (level === 'warn') return 'warn';
  if (level === 'error') return 'error';
  return 'info';
}

export function log(level: NivelLog, msg: string, meta: Meta = {}) {
  if (PRIORIDAD[level] < nivelMinimo()) return;
  const levelStd = nivelEstandar(level);
  const entry = {
    timestamp: new Date().toISOString(),
    service: servicio,
    env,
    level: levelStd,
    message: msg,
    ...meta
  };

  const line = JSON.stringify(entry);
  if (levelStd === 'error') console.error(line);
  else if (levelStd === 'warn') console.warn(line);
  else console.log(line);
}

export function logError(msg: string, error?: unknown, meta: Meta = {}) {
  log('error', msg, { ...meta, error: serializarError(error) });
}
