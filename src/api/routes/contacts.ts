import type { FastifyPluginAsync } from 'fastify';
import type { ServiceContainer } from '../../index.js';
import type { SearchOutcome } from '../../services/contact-search/index.js';
import { ResultsTruncatedError } from '../../lib/errors.js';
import { exportResultSetToCsv } from '../../services/export/csv.js';

export const contactRoutes: FastifyPluginAsync<{ container: ServiceContainer }> = async (app, opts) => {
  const { searchService } = opts.container;

  // POST /api/contacts/search
  app.post('/search', async (request) => {
    const outcome = await searchService.search(request.body);
    return toResponse(outcome);
  });

  // POST /api/contacts/search/plan (no provider calls)
  app.post('/search/plan', async (request) => {
    const { spec, plan } = await searchService.plan(request.body);
    return {
      data: {
        criteria: spec.criteria,
        timeRange: spec.timeRange ?? null,
        requests: plan.requests,
        deferred: plan.deferred,
      },
    };
  });

  // POST /api/contacts/search/export
  app.post('/search/export', async (request, reply) => {
    const outcome = await searchService.search(request.body);
    const csv = await exportResultSetToCsv(outcome.resultSet);
    return reply
      .header('content-type', 'text/csv; charset=utf-8')
      .header('content-disposition', 'attachment; filename="contacts.csv"')
      .header('x-search-partial', String(outcome.status === 'partial'))
      .send(csv);
  });
};

function toResponse(outcome: SearchOutcome) {
  const { resultSet } = outcome;
  return {
    data: resultSet.records,
    meta: {
      partial: resultSet.partial,
      total: resultSet.records.length,
      stats: resultSet.stats,
      ...(outcome.status === 'partial' ? { error: describeError(outcome.error) } : {}),
    },
  };
}

// Truncated searches carry the tokens to resume each capped sub-query from.
function describeError(error: Extract<SearchOutcome, { status: 'partial' }>['error']) {
  return {
    code: error.code,
    message: error.message,
    ...(error instanceof ResultsTruncatedError ? { truncated: error.truncated } : {}),
  };
}
