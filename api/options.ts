import type { VercelRequest, VercelResponse } from '@vercel/node';
import { SUPPORTED_EXTENSIONS } from './_lib/fileKind.js';
import {
  ANSWER_FORMATS,
  DIFFICULTIES,
  DIFFICULTY_LABELS,
  FORMAT_LABELS,
  QUESTION_COUNT
} from './_lib/prompts.js';

export function buildOptionsPayload() {
  return {
    difficulties: DIFFICULTIES.map((value) => ({ value, label: DIFFICULTY_LABELS[value] })),
    formats: ANSWER_FORMATS.map((value) => ({ value, label: FORMAT_LABELS[value] })),
    extensions: SUPPORTED_EXTENSIONS,
    questionCount: QUESTION_COUNT
  };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    return res.status(405).json({ error: { code: 'method_not_allowed', message: 'GET required.' } });
  }
  return res.status(200).json(buildOptionsPayload());
}
