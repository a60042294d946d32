/**
 * Batch Runner
 *
 * Runs independent per-game units in parallel slices. A failing unit is
 * recorded against that unit and the rest carry on; an abort stops new
 * units from starting but lets started ones finish.
 */

export type UnitStatus = 'succeeded' | 'skipped' | 'failed' | 'cancelled';

/** What a worker reports for a unit that did not throw */
export type UnitResult<T> =
  | { status: 'succeeded'; value: T; detail?: string }
  | { status: 'skipped'; detail: string; value?: T };

export interface UnitReport<T> {
  unit: string;
  status: UnitStatus;
  value?: T;
  detail?: string;
  error?: Error;
}

export interface BatchReport<T> {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  cancelled: number;
  units: UnitReport<T>[];
  durationMs: number;
}

export interface BatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** Called as each unit settles */
  onUnit?: (report: UnitReport<unknown>) => void;
}

export const DEFAULT_BATCH_CONCURRENCY = 4;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runBatch<T>(
  units: readonly string[],
  worker: (unit: string) => Promise<UnitResult<T>> | UnitResult<T>,
  options: BatchOptions = {}
): Promise<BatchReport<T>> {
  const started = Date.now();
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);
  const reports: UnitReport<T>[] = [];

  const settle = (report: UnitReport<T>): void => {
    reports.push(report);
    options.onUnit?.(report);
  };

  for (let i = 0; i < units.length; i += concurrency) {
    const slice = units.slice(i, i + concurrency);

    if (options.signal?.aborted) {
      for (const unit of units.slice(i)) {
        settle({ unit, status: 'cancelled', detail: 'batch aborted before the unit started' });
      }
      break;
    }

    const sliceReports = await Promise.all(slice.map(async (unit): Promise<UnitReport<T>> => {
      try {
        const result = await worker(unit);
        return { unit, status: result.status, value: result.value, detail: result.detail };
      } catch (error) {
        const failure = toError(error);
        console.log(`[BatchRunner] Unit ${unit} failed: ${failure.message}`);
        return { unit, status: 'failed', error: failure, detail: failure.message };
      }
    }));

    for (const report of sliceReports) settle(report);
  }

  const count = (status: UnitStatus): number => reports.filter((report) => report.status === status).length;

  return {
    total: units.length,
    succeeded: count('succeeded'),
    skipped: count('skipped'),
    failed: count('failed'),
    cancelled: count('cancelled'),
    units: reports,
    durationMs: Date.now() - started
  };
}
