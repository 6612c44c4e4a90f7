// api/dashboardExport.ts
// POST { rows, filter? } → KPI_Dashboard.xlsx

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { buildDashboardWorkbook } from '../engine/dashboardWorkbook';
import { dashboardReply, runDashboard } from '../engine/dashboardService';
import { parseRequestBody, validateRowsRequest } from '../engine/validateTransport';
import { errorMessage, logError } from '../engine/log';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const parsed = parseRequestBody(req.body);
  if (!parsed.ok) {
    return res.status(parsed.errorStatus).json(parsed.errorBody);
  }

  const request = validateRowsRequest(parsed.body);
  if (!request.ok) {
    return res.status(request.errorStatus).json(request.errorBody);
  }

  try {
    const outcome = await runDashboard({ kind: 'rows', rows: request.rows }, request.filter);

    if (!outcome.ok || outcome.result.status !== 'OK') {
      // Load failure or empty selection: nothing to export, answer as JSON
      const reply = dashboardReply(outcome);
      return res.status(reply.status).json(reply.body);
    }

    const dateISO = new Date().toISOString().slice(0, 10);
    const buffer = await buildDashboardWorkbook(outcome.result, dateISO);

    res.setHeader(
      'Content-Type',
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet'
    );
    res.setHeader(
      'Content-Disposition',
      'attachment; filename="KPI_Dashboard.xlsx"'
    );

    return res.status(200).send(buffer);
  } catch (err) {
    logError('dashboard_export_failed', { message: errorMessage(err) });
    return res.status(500).json({ error: 'Failed to generate KPI dashboard Excel file.' });
  }
}
