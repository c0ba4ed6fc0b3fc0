import { z } from "zod";

/**
 * A single attributed message. Messages are frozen once the corpus loads them.
 */
export const messageSchema = z.object({
  id: z.string().min(1, "Message id is required"),
  person: z.string().trim().min(1, "Person is required"),
  timestamp: z.string().datetime({ offset: true }),
  text: z.string(),
  topic: z.string().optional(),
  userId: z.string().optional(),
});

export type Message = Readonly<z.infer<typeof messageSchema>>;

/**
 * Upstream member-messages API record. Field names differ from ours, and ids
 * are sometimes numeric.
 */
export const upstreamMessageSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]),
    user_id: z.union([z.string(), z.number()]).optional(),
    user_name: z.string().trim().min(1),
    timestamp: z.string().datetime({ offset: true }),
    message: z.string(),
    topic: z.string().optional(),
  })
  .transform((raw): z.infer<typeof messageSchema> => ({
    id: String(raw.id),
    person: raw.user_name,
    timestamp: raw.timestamp,
    text: raw.message,
    ...(raw.topic !== undefined && { topic: raw.topic }),
    ...(raw.user_id !== undefined && { userId: String(raw.user_id) }),
  }));

export const messageRecordSchema = z.union([messageSchema, upstreamMessageSchema]);

export type TargetPersonSource = "caller" | "extracted" | "none";

export type Query = {
  rawText: string;
  targetPerson?: string;
  targetPersonSource: TargetPersonSource;
};

/**
 * Cosine similarity against one query's vector. Not comparable across queries.
 */
export type Candidate = {
  message: Message;
  similarityScore: number;
};

/**
 * The only shape that is ever sent to the reasoning backend. No ids.
 */
export type SanitizedCandidate = {
  text: string;
  person: string;
  timestamp: string;
  similarityScore: number;
};

export const QUESTION_SHAPES = ["count", "list", "temporal", "fact"] as const;
export type QuestionShape = typeof QUESTION_SHAPES[number];

export type Answer = {
  text: string;
  supportingCandidateIds: string[];
  shape?: QuestionShape;
  count?: number;
  insufficientData?: boolean;
  promptVersion?: string;
};

// Request/response bodies for the HTTP surface
export const askRequestSchema = z.object({
  question: z.string({ required_error: "question is required" }),
  targetPerson: z.string().trim().min(1).optional(),
});

export const askQuerySchema = z.object({
  question: z.string({ required_error: "question is required" }),
  person: z.string().trim().min(1).optional(),
});

export type AskRequest = z.infer<typeof askRequestSchema>;
export type AskQuery = z.infer<typeof askQuerySchema>;

export type AskResponse = {
  answer: string;
  supportingCandidateIds: string[];
  count?: number;
  insufficientData?: boolean;
};
