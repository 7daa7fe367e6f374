import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../errors';
import {
  DeleteArticlesBodySchema,
  FeedUpdateSchema,
  MultiAnalysisBodySchema,
  SearchQuerySchema,
  TagCreateSchema,
} from '../../schemas';
import { parseInput } from '../middleware';

describe('parseInput', () => {
  it('coerces query strings', () => {
    expect(parseInput(SearchQuerySchema, { q: ' solar ', limit: '5', useAi: 'true' })).toEqual({
      q: 'solar',
      limit: 5,
      useAi: true,
    });
  });

  it('raises ValidationError naming the offending field', () => {
    expect(() => parseInput(SearchQuerySchema, { q: '' })).toThrow(ValidationError);
    expect(() => parseInput(SearchQuerySchema, { q: '' })).toThrow('q: q is required');
  });

  it('fills deletion defaults and parses the cutoff date', () => {
    const body = parseInput(DeleteArticlesBodySchema, { beforeDate: '2024-01-01T00:00:00Z' });

    expect(body).toEqual({
      beforeDate: new Date('2024-01-01T00:00:00Z'),
      deleteSummaries: true,
      deleteFromVectorStore: true,
      confirmAll: false,
    });
  });

  it('rejects an unparseable cutoff date', () => {
    expect(() => parseInput(DeleteArticlesBodySchema, { beforeDate: 'last tuesday' })).toThrow(
      'beforeDate: must be an ISO-8601 date'
    );
  });

  it('requires at least one field on a feed update', () => {
    expect(() => parseInput(FeedUpdateSchema, {})).toThrow('at least one of name, url or enabled is required');
    expect(parseInput(FeedUpdateSchema, { enabled: false })).toEqual({ enabled: false });
  });

  it('checks tag colours', () => {
    expect(() => parseInput(TagCreateSchema, { name: 'World', color: 'blue' })).toThrow(ValidationError);
  });

  it('accepts a null focus for multi-article analysis', () => {
    expect(parseInput(MultiAnalysisBodySchema, { articleIds: ['a', 'b'], focus: null })).toEqual({
      articleIds: ['a', 'b'],
      focus: null,
    });
  });
});
