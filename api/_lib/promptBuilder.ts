import type { GenerationOptions } from '../../types.js';
import { subjectName } from './fileKind.js';
import { DIFFICULTY_LABELS, FORMAT_LABELS, NO_FOCUS_LABEL, QUESTION_COUNT } from './prompts.js';

export function buildRulesLine(options: GenerationOptions): string {
  const focus = options.focus?.trim() || NO_FOCUS_LABEL;
  return [
    `Difficulty: ${DIFFICULTY_LABELS[options.difficulty]}`,
    `Format: ${FORMAT_LABELS[options.format]}`,
    `Focus: ${focus}`
  ].join(' / ');
}

export function buildQuizPrompt(fileName: string, options: GenerationOptions): string {
  const subject = subjectName(fileName) || 'this material';
  return [
    `You are an expert on **${subject}**.`,
    `Generation rules: ${buildRulesLine(options)}`,
    `Following these rules, write exactly ${QUESTION_COUNT} questions in total, each followed by a model answer.`
  ].join('\n');
}
