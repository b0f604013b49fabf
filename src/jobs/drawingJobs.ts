import type { Services } from '../services';

export interface DrawingJobSummary {
  opened: number[];
  closed: number[];
  executed: number[];
  errors: { drawing_id: number; step: 'open' | 'close' | 'execute'; error: string }[];
}

/**
 * One pass of the drawing lifecycle: open what is due, close what is due,
 * execute closed drawings whose draw time has passed. Every step is
 * idempotent, so overlapping instances only repeat no-ops.
 */
export const runDrawingLifecycle = async (
  { drawings, executor, logger }: Pick<Services, 'drawings' | 'executor' | 'logger'>,
  now: Date
): Promise<DrawingJobSummary> => {
  const opened = await drawings.openDueDrawings(now);
  const closed = await drawings.closeDueDrawings(now);
  const executed = await executor.executeDueDrawings(now);

  const summary: DrawingJobSummary = {
    opened: opened.drawing_ids,
    closed: closed.drawing_ids,
    executed: executed.drawing_ids,
    errors: [
      ...opened.errors.map((item) => ({ ...item, step: 'open' as const })),
      ...closed.errors.map((item) => ({ ...item, step: 'close' as const })),
      ...executed.errors.map((item) => ({ ...item, step: 'execute' as const })),
    ],
  };

  logger.info('job.drawing_lifecycle', {
    opened: summary.opened.length,
    closed: summary.closed.length,
    executed: summary.executed.length,
    errors: summary.errors.length,
  });
  return summary;
};
