import { z } from 'zod';

// BetsAPI mixes numbers and numeric strings for the same field
const text = z.union([z.string(), z.number()]).transform(v => String(v).trim());

export const EnvelopeSchema = z.object({
  success: z.union([z.number(), z.boolean()]).optional(),
  error: z.string().optional(),
  results: z.unknown().optional(),
});

export const RecordTypeSchema = z.object({ type: z.string() });

export const CompetitionRecordSchema = z.object({
  type: z.literal('CT'),
  NA: z.string(),
});

export const EventRecordSchema = z.object({
  type: z.literal('EV'),
  NA: z.string().min(1),
  C2: text.optional(),
  C3: text.optional(),
  ID: text.optional(),
  /** Minutes left in the quarter */
  TM: z.coerce.number().int().nonnegative().optional(),
  /** Seconds part of the time left */
  TS: z.coerce.number().int().min(0).max(59).optional(),
  /** 1 while the clock runs */
  TT: z.coerce.number().int().optional(),
  /** Current period, e.g. "Q2" */
  CP: z.string().optional(),
  /** Scoreboard "H-A" */
  SS: z.string().optional(),
});

export const MarketRecordSchema = z.object({
  type: z.literal('MA'),
  NA: z.string(),
});

export const ParticipantRecordSchema = z.object({
  type: z.literal('PA'),
  NA: z.string().optional(),
  HA: text.optional(),
  OD: z.string().optional(),
});

export type EventRecord = z.infer<typeof EventRecordSchema>;
export type ParticipantRecord = z.infer<typeof ParticipantRecordSchema>;

export const UpcomingEventSchema = z.object({
  id: text,
  /** Epoch seconds */
  time: z.coerce.number().int().positive(),
  time_status: text.optional(),
  league: z.object({ id: text.optional(), name: z.string() }),
  home: z.object({ name: z.string().min(1) }),
  away: z.object({ name: z.string().min(1) }),
});

export type UpcomingEvent = z.infer<typeof UpcomingEventSchema>;

export const ResultEventSchema = z.object({
  time_status: text.optional(),
  ss: z.string().nullish(),
  SS: z.string().nullish(),
  scores: z.object({
    ft_home: z.coerce.number().int().optional(),
    ft_away: z.coerce.number().int().optional(),
  }).passthrough().optional(),
});
