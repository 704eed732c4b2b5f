import type { Participant } from '../render-jobs.types';

// Participants with no relation recorded are treated as neutral.
export const DEFAULT_RELATION = 2;

const optionalString = (value: unknown) =>
  typeof value === 'string' && value.length > 0 ? value : null;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toParticipant = (record: unknown): Participant | null => {
  if (!isRecord(record)) return null;

  const relation =
    typeof record.relation === 'number' && Number.isInteger(record.relation)
      ? record.relation
      : DEFAULT_RELATION;

  return {
    name: typeof record.name === 'string' ? record.name : 'Unknown',
    clan: optionalString(record.clan),
    ship: typeof record.ship === 'string' ? record.ship : 'Unknown Ship',
    relation,
    build_url: optionalString(record.build_url),
  };
};

/** Returns null unless the decoded metadata is a list of participant records. */
export const parseParticipants = (raw: unknown): Participant[] | null => {
  if (!Array.isArray(raw)) return null;
  return raw
    .map(toParticipant)
    .filter((p): p is Participant => p !== null);
};
