import type { AnswerFormat, Difficulty } from '../../types.js';

export const QUESTION_COUNT = 5;

export const DIFFICULTIES: readonly Difficulty[] = ['standard', 'hard', 'easy'];

export const ANSWER_FORMATS: readonly AnswerFormat[] = ['essay', 'qa', 'multiple-choice'];

export const DIFFICULTY_LABELS: Record<Difficulty, string> = {
  standard: 'Standard',
  hard: 'Hard (applied, essay-style reasoning)',
  easy: 'Easy (fundamentals and terminology)'
};

export const FORMAT_LABELS: Record<AnswerFormat, string> = {
  essay: 'Essay',
  qa: 'Short question and answer',
  'multiple-choice': 'Multiple choice (4 options)'
};

export const IMAGE_INSTRUCTION =
  'The following image is a photo of lecture board notes or an important diagram. ' +
  'Understand its content completely and generate questions based on it.';

export const AUDIO_INSTRUCTION =
  'The following audio file is a lecture recording. ' +
  'First transcribe its content completely, then generate questions using only that transcript.';

export const NO_FOCUS_LABEL = 'none specified';
