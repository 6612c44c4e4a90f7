// api/dashboardExcel.ts
import type { VercelRequest, VercelResponse } from '@vercel/node';
import OpenAI from 'openai';

import { dashboardReply, internalErrorReply, runDashboard } from '../engine/dashboardService';
import { parseRequestBody, validateFileRequest } from '../engine/validateTransport';
import { errorMessage, logError, logInfo, logWarn } from '../engine/log';

/**
 * POST /api/dashboardExcel
 * Body: { file_id: string, filter? }
 * The workbook is fetched from OpenAI file storage by its file handle.
 */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    return res.status(405).json({ error: 'Method not allowed. Use POST.' });
  }

  const parsed = parseRequestBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }

  const request = validateFileRequest(parsed.body);
  if (!request.ok) {
    logWarn('transport_validation_failed_4xx', { endpoint: 'dashboardExcel', error_body: request.errorBody });
    return res.status(request.errorStatus).json(request.errorBody);
  }

  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    logError('openai_key_missing', { endpoint: 'dashboardExcel' });
    return res
      .status(500)
      .json({ error: 'Dashboard Excel processing failed (server): OPENAI_API_KEY not set' });
  }

  try {
    // 1) Download the workbook from OpenAI file storage
    const openai = new OpenAI({ apiKey });
    const fileResponse = await openai.files.content(request.file_id);
    const data = await fileResponse.arrayBuffer();

    // 2) Same core as /api/dashboard
    const outcome = await runDashboard({ kind: 'workbook', data }, request.filter);
    const reply = dashboardReply(outcome);

    logInfo('dashboard_request_completed', {
      endpoint: 'dashboardExcel',
      http_status: reply.status,
      file_bytes: data.byteLength
    });

    return res.status(reply.status).json(reply.body);
  } catch (err) {
    logError('dashboard_unhandled_exception', { endpoint: 'dashboardExcel', message: errorMessage(err) });
    const reply = internalErrorReply();
    return res.status(reply.status).json(reply.body);
  }
}
