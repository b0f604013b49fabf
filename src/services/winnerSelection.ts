import { createHash, createHmac, randomBytes } from 'node:crypto';
import type { SequenceAssignment, Ticket } from '../models/types';

/**
 * hmac-sha256-rejection-v1
 *
 * The seed is 32 random bytes in hex. Draw k reads the first 6 bytes of
 * HMAC-SHA256(key = seed bytes, message = "<version>:<k>") as a 48-bit
 * integer, with k counting up from 0 across the whole execution. A value at
 * or above the largest multiple of n below 2^48 is rejected and the next k
 * is tried; otherwise `value % n` indexes the eligible sequence list.
 * After each pick every ticket of the picked user leaves the eligible list.
 */
export const ALGORITHM_VERSION = 'hmac-sha256-rejection-v1';

const RANGE = 2 ** 48;

export type SeedSource = () => string;

export const generateSeed: SeedSource = () => randomBytes(32).toString('hex');

export interface Entrant {
  sequence_number: number;
  user_id: number;
}

export const toEntrants = (tickets: Ticket[]): Entrant[] => {
  const entrants: Entrant[] = [];
  for (const ticket of tickets) {
    if (ticket.sequence_number !== null) {
      entrants.push({ sequence_number: ticket.sequence_number, user_id: ticket.user_id });
    }
  }
  return entrants.sort((a, b) => a.sequence_number - b.sequence_number);
};

/** Deterministic 48-bit values derived from the seed. */
export const seededStream = (seed: string): (() => number) => {
  const key = Buffer.from(seed, 'hex');
  let counter = 0;
  return () => {
    const digest = createHmac('sha256', key).update(`${ALGORITHM_VERSION}:${counter}`).digest();
    counter += 1;
    return digest.readUIntBE(0, 6);
  };
};

export const uniformIndex = (next: () => number, size: number): number => {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Cannot draw from ${size} entries`);
  }
  const limit = RANGE - (RANGE % size);
  for (;;) {
    const value = next();
    if (value < limit) {
      return value % size;
    }
  }
};

/** Winning sequence numbers in draw order. */
export const selectWinners = (seed: string, entrants: Entrant[], winnerCount: number): number[] => {
  const next = seededStream(seed);
  let eligible = [...entrants].sort((a, b) => a.sequence_number - b.sequence_number);
  const winners: number[] = [];

  while (winners.length < winnerCount && eligible.length > 0) {
    const picked = eligible[uniformIndex(next, eligible.length)];
    winners.push(picked.sequence_number);
    eligible = eligible.filter((entrant) => entrant.user_id !== picked.user_id);
  }

  return winners;
};

export const assignSequenceNumbers = (tickets: Ticket[]): SequenceAssignment[] =>
  tickets.map((ticket, index) => ({ ticket_id: ticket.id, sequence_number: index + 1 }));

export const snapshotDigest = (assignments: SequenceAssignment[]): string => {
  const hash = createHash('sha256');
  for (const assignment of assignments) {
    hash.update(`${assignment.sequence_number}:${assignment.ticket_id}\n`);
  }
  return hash.digest('hex');
};

export const seedReference = (seed: string): string =>
  `sha256:${createHash('sha256').update(seed).digest('hex')}`;
