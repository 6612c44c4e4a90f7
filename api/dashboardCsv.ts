// api/dashboardCsv.ts
//
// POST { csv_text: string, filter? }
// Same dashboard core as /api/dashboard, fed from a CSV export of the sheet.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { dashboardReply, internalErrorReply, runDashboard } from '../engine/dashboardService';
import { parseRequestBody, validateCsvRequest } from '../engine/validateTransport';
import { errorMessage, logError, logInfo, logWarn } from '../engine/log';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const parsed = parseRequestBody(req.body);
  if (!parsed.ok) {
    logWarn('request_body_rejected', { endpoint: 'dashboardCsv', status: parsed.errorStatus });
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }

  const request = validateCsvRequest(parsed.body);
  if (!request.ok) {
    logWarn('transport_validation_failed_4xx', { endpoint: 'dashboardCsv', error_body: request.errorBody });
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const outcome = await runDashboard({ kind: 'csv', csv_text: request.csv_text }, request.filter);
    const reply = dashboardReply(outcome);

    logInfo('dashboard_request_completed', {
      endpoint: 'dashboardCsv',
      http_status: reply.status,
      csv_length: request.csv_text.length
    });

    return res.status(reply.status).json(reply.body);
  } catch (err) {
    logError('dashboard_unhandled_exception', { endpoint: 'dashboardCsv', message: errorMessage(err) });
    const reply = internalErrorReply();
    return res.status(reply.status).json(reply.body);
  }
}
