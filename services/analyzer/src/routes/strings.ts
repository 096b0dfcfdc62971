import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors';
import { applyFilters, compactFilters } from '../filters/evaluate';
import { parseFilterQuery } from '../filters/params';
import { interpretQuery } from '../query/interpreter';
import type { RecordStore } from '../contracts/recordStore';
import type { ParsedQuery } from '../types';

// ---------- Schemas ----------
const createSchema = z.object({
  value: z.string({
    required_error: 'Missing "value" field',
    invalid_type_error: 'Invalid data type for "value" (must be string)',
  }),
});

const valueParamsSchema = z.object({
  value: z.string(),
});

const naturalLanguageSchema = z.object({
  query: z.string().optional(),
});

// ---------- Helper ----------
function parseOrThrow<T>(schema: z.ZodType<T>, input: unknown, message: string): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ValidationError(message, { issues: parsed.error.flatten() });
  return parsed.data;
}

// ---------- Routes ----------
export async function registerStringRoutes(app: FastifyInstance, store: RecordStore) {
  // Create / upsert
  app.post('/strings', async (req, reply) => {
    const { value } = parseOrThrow(createSchema, req.body ?? {}, 'Invalid request body');
    const { record, created } = await store.put(value);
    req.log.info({ id: record.id, created, version: record.version }, 'string stored');
    return reply.code(201).send(record);
  });

  // Natural-language filter; registered as a static path so it wins over /strings/:value
  app.get('/strings/filter-by-natural-language', async (req, reply) => {
    const { query = '' } = parseOrThrow(naturalLanguageSchema, req.query, 'Invalid query parameters');
    const interpretation = interpretQuery(query);
    const data = applyFilters(interpretation.filters, await store.list());

    const body: ParsedQuery = {
      data,
      count: data.length,
      interpreted_query: {
        original: query,
        parsed_filters: interpretation.filters,
        matched_rules: interpretation.matches,
      },
    };
    return reply.send(body);
  });

  // Read one
  app.get('/strings/:value', async (req, reply) => {
    const { value } = parseOrThrow(valueParamsSchema, req.params, 'Invalid path');
    const record = await store.get(value);
    if (!record) throw new NotFoundError();
    return reply.send(record);
  });

  // List with structured filters
  app.get('/strings', async (req, reply) => {
    const filters = compactFilters(parseFilterQuery(req.query));
    const data = applyFilters(filters, await store.list());
    return reply.send({ data, count: data.length, filters_applied: filters });
  });

  // Delete
  app.delete('/strings/:value', async (req, reply) => {
    const { value } = parseOrThrow(valueParamsSchema, req.params, 'Invalid path');
    const removed = await store.delete(value);
    if (!removed) throw new NotFoundError();
    return reply.code(204).send();
  });
}
