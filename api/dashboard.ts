// api/dashboard.ts
// KPI Dashboard HTTP entrypoint for JSON rows
//
// POST { rows: object[], filter?: { members?, months?, statuses? } }

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { dashboardReply, internalErrorReply, runDashboard } from '../engine/dashboardService';
import { parseRequestBody, validateRowsRequest } from '../engine/validateTransport';
import { errorMessage, logError, logInfo, logWarn } from '../engine/log';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    logWarn('method_not_allowed', { endpoint: 'dashboard', method: req.method });
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const parsed = parseRequestBody(req.body);
  if (!parsed.ok) {
    logWarn('request_body_rejected', { endpoint: 'dashboard', status: parsed.errorStatus, error_body: parsed.errorBody });
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }

  const request = validateRowsRequest(parsed.body);
  if (!request.ok) {
    logWarn('transport_validation_failed_4xx', { endpoint: 'dashboard', status: request.errorStatus, error_body: request.errorBody });
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const outcome = await runDashboard({ kind: 'rows', rows: request.rows }, request.filter);
    const reply = dashboardReply(outcome);

    logInfo('dashboard_request_completed', {
      endpoint: 'dashboard',
      http_status: reply.status,
      rows_in: request.rows.length,
      result_status: outcome.ok ? outcome.result.status : 'LOAD_FAILED'
    });

    return res.status(reply.status).json(reply.body);
  } catch (err) {
    logError('dashboard_unhandled_exception', { endpoint: 'dashboard', message: errorMessage(err) });
    const reply = internalErrorReply();
    return res.status(reply.status).json(reply.body);
  }
}
