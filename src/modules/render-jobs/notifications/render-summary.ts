import type { Participant } from '../render-jobs.types';

export const RENDER_COMPLETE_TITLE = 'Render Complete';
export const RENDER_COMPLETE_COLOR = 0x57f287;
export const FIELD_VALUE_LIMIT = 1024;
export const TRUNCATION_SUFFIX = '...';

export type EmbedField = { name: string; value: string; inline: boolean };

export type Embed = { title: string; color: number; fields: EmbedField[] };

export type RenderSummary = { content: string } | { embeds: Embed[] };

export type SubjectPolicy = {
  nonSubjectRelations: readonly number[];
};

// Counts code points, so a cut never splits a surrogate pair.
export const truncateFieldValue = (value: string, limit = FIELD_VALUE_LIMIT) => {
  const chars = Array.from(value);
  if (chars.length <= limit) return value;
  return `${chars.slice(0, limit - TRUNCATION_SUFFIX.length).join('')}${TRUNCATION_SUFFIX}`;
};

const byName = (a: Participant, b: Participant) =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

/**
 * Splits participants into the player the replay belongs to and everyone else.
 * Which relation categories count as "everyone else" is policy.
 */
export const splitParticipants = (
  participants: Participant[],
  policy: SubjectPolicy,
) => {
  const subjects: Participant[] = [];
  const others: Participant[] = [];
  for (const p of participants) {
    if (policy.nonSubjectRelations.includes(p.relation)) others.push(p);
    else subjects.push(p);
  }
  others.sort(byName);
  return { subjects, others };
};

export const buildRenderSummary = (
  participants: Participant[] | null,
  policy: SubjectPolicy,
): RenderSummary => {
  if (!participants || participants.length === 0) {
    return { content: 'No player info available.' };
  }

  const { subjects, others } = splitParticipants(participants, policy);

  const fields: EmbedField[] = [
    {
      name: 'Player In Render',
      value: subjects.length
        ? subjects.map((p) => `${p.name} (${p.ship})`).join('\n')
        : 'Unknown',
      inline: false,
    },
  ];

  if (others.length) {
    fields.push({
      name: 'Other Players',
      value: truncateFieldValue(others.map((p) => p.name).join(', ')),
      inline: false,
    });
  }

  return {
    embeds: [{ title: RENDER_COMPLETE_TITLE, color: RENDER_COMPLETE_COLOR, fields }],
  };
};
