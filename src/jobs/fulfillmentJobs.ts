import type { Services } from '../services';

export interface FulfillmentJobSummary {
  notified: number[];
  warned: number[];
  forfeited: number[];
  errors: { fulfillment_id: number; error: string }[];
}

export const runFulfillmentJob = async (
  { fulfillment, logger }: Pick<Services, 'fulfillment' | 'logger'>,
  now: Date
): Promise<FulfillmentJobSummary> => {
  const notified = await fulfillment.notifyPendingWinners(now);
  const swept = await fulfillment.sweepTimeouts(now);

  const summary: FulfillmentJobSummary = {
    notified: notified.fulfillment_ids,
    warned: swept.warned,
    forfeited: swept.forfeited,
    errors: [...notified.errors, ...swept.errors],
  };

  logger.info('job.fulfillment', {
    notified: summary.notified.length,
    warned: summary.warned.length,
    forfeited: summary.forfeited.length,
    errors: summary.errors.length,
  });
  return summary;
};
