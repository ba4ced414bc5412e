import type { VercelRequest, VercelResponse } from '@vercel/node';
import { describe, expect, it, vi } from 'vitest';
import optionsHandler, { buildOptionsPayload } from '../../api/options.js';
import { createResultHandler } from '../../api/result.js';
import { GenerationResultHolder } from '../../api/_lib/resultHolder.js';

const buildRes = () => {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

const asReq = (method: string) => ({ method }) as unknown as VercelRequest;

describe('result handler', () => {
  it('returns null before any generation', async () => {
    const res = buildRes();
    await createResultHandler(new GenerationResultHolder())(asReq('GET'), res as unknown as VercelResponse);
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ result: null });
  });

  it('returns the latest result', async () => {
    const holder = new GenerationResultHolder();
    holder.set({ status: 'success', text: 'first' });
    holder.set({ status: 'error', code: 'model_blocked', message: 'Error: blocked' });
    const res = buildRes();

    await createResultHandler(holder)(asReq('GET'), res as unknown as VercelResponse);

    expect(res.json).toHaveBeenCalledWith({
      result: { status: 'error', code: 'model_blocked', message: 'Error: blocked' }
    });
  });

  it('requires GET', async () => {
    const res = buildRes();
    await createResultHandler(new GenerationResultHolder())(asReq('POST'), res as unknown as VercelResponse);
    expect(res.status).toHaveBeenCalledWith(405);
  });
});

describe('GenerationResultHolder', () => {
  it('clears on reset', () => {
    const holder = new GenerationResultHolder();
    holder.set({ status: 'success', text: 'quiz' });
    holder.reset();
    expect(holder.get()).toBeNull();
  });
});

describe('options handler', () => {
  it('lists the selectable options', async () => {
    const payload = buildOptionsPayload();

    expect(payload.difficulties.map((item) => item.value)).toEqual(['standard', 'hard', 'easy']);
    expect(payload.formats.map((item) => item.value)).toEqual(['essay', 'qa', 'multiple-choice']);
    expect(payload.extensions).toEqual(['.pdf', '.png', '.jpg', '.jpeg', '.mp3', '.wav']);
    expect(payload.questionCount).toBe(5);

    const res = buildRes();
    await optionsHandler(asReq('GET'), res as unknown as VercelResponse);
    expect(res.json).toHaveBeenCalledWith(payload);
  });
});
