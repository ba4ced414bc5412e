import type { VercelRequest, VercelResponse } from '@vercel/node';
import { generationResults, type GenerationResultHolder } from './_lib/resultHolder.js';

export function createResultHandler(holder: GenerationResultHolder = generationResults) {
  return async function handler(req: VercelRequest, res: VercelResponse) {
    if (req.method !== 'GET') {
      return res.status(405).json({ error: { code: 'method_not_allowed', message: 'GET required.' } });
    }
    return res.status(200).json({ result: holder.get() });
  };
}

export default createResultHandler();
