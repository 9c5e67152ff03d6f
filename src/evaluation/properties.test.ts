import { describe, it, expect } from 'vitest'
import { InconclusiveMatchError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { CohortDefinitions, PersonPropertyFilter, PropertyGroup, PropertyOperator } from '../types.js'
import { matchCohort, matchProperty, matchPropertyGroup, parseRelativeDate } from './properties.js'

// Helpers

const log = createLogger({ name: 'test', level: 'silent' })

function person(key: string, operator: PropertyOperator, value: unknown, negation?: boolean): PersonPropertyFilter {
  const filter: PersonPropertyFilter = { type: 'person', key, operator, value }
  if (negation !== undefined) filter.negation = negation
  return filter
}

// -- matchProperty -------------------------------------------------------------

describe('matchProperty', () => {
  describe('exact and is_not', () => {
    it('compares case-insensitively', () => {
      expect(matchProperty(person('email', 'exact', 'Ada@Example.com'), { email: 'ada@example.COM' }, log)).toBe(true)
    })

    it('matches any entry of a list value', () => {
      expect(matchProperty(person('country', 'exact', ['US', 'CA']), { country: 'ca' }, log)).toBe(true)
      expect(matchProperty(person('country', 'exact', ['US', 'CA']), { country: 'FR' }, log)).toBe(false)
    })

    it('compares numbers with strings by their text', () => {
      expect(matchProperty(person('plan_id', 'exact', '42'), { plan_id: 42 }, log)).toBe(true)
    })

    it('inverts for is_not', () => {
      expect(matchProperty(person('plan', 'is_not', 'free'), { plan: 'pro' }, log)).toBe(true)
      expect(matchProperty(person('plan', 'is_not', 'free'), { plan: 'FREE' }, log)).toBe(false)
    })
  })

  describe('presence', () => {
    it('is_set reports whether the key is present', () => {
      expect(matchProperty(person('plan', 'is_set', ''), { plan: 'pro' }, log)).toBe(true)
      expect(matchProperty(person('plan', 'is_set', ''), {}, log)).toBe(false)
    })

    it('is_not_set is inconclusive', () => {
      expect(() => matchProperty(person('plan', 'is_not_set', ''), {}, log)).toThrow(InconclusiveMatchError)
    })

    it('throws InconclusiveMatchError when the property is missing', () => {
      expect(() => matchProperty(person('plan', 'exact', 'pro'), { other: 'x' }, log)).toThrow(InconclusiveMatchError)
    })
  })

  describe('null values', () => {
    it('fails every operator except is_not', () => {
      expect(matchProperty(person('plan', 'exact', 'pro'), { plan: null }, log)).toBe(false)
      expect(matchProperty(person('plan', 'icontains', 'pro'), { plan: null }, log)).toBe(false)
      expect(matchProperty(person('plan', 'gt', 1), { plan: null }, log)).toBe(false)
      expect(matchProperty(person('plan', 'is_not', 'pro'), { plan: null }, log)).toBe(true)
    })
  })

  describe('icontains', () => {
    it('matches substrings case-insensitively', () => {
      expect(matchProperty(person('email', 'icontains', 'gmail'), { email: 'ada@GMAIL.com' }, log)).toBe(true)
      expect(matchProperty(person('email', 'not_icontains', 'gmail'), { email: 'ada@GMAIL.com' }, log)).toBe(false)
    })
  })

  describe('regex', () => {
    it('tests the stringified property', () => {
      expect(matchProperty(person('id', 'regex', '^user-\\d+$'), { id: 'user-42' }, log)).toBe(true)
      expect(matchProperty(person('id', 'not_regex', '^user-\\d+$'), { id: 'admin' }, log)).toBe(true)
    })

    it('treats an invalid pattern as a non-match for both operators', () => {
      expect(matchProperty(person('id', 'regex', '(unclosed'), { id: 'anything' }, log)).toBe(false)
      expect(matchProperty(person('id', 'not_regex', '(unclosed'), { id: 'anything' }, log)).toBe(false)
    })
  })

  describe('ordering', () => {
    it('compares numbers', () => {
      expect(matchProperty(person('age', 'gt', 18), { age: 21 }, log)).toBe(true)
      expect(matchProperty(person('age', 'gte', 21), { age: 21 }, log)).toBe(true)
      expect(matchProperty(person('age', 'lt', 18), { age: 21 }, log)).toBe(false)
      expect(matchProperty(person('age', 'lte', 21), { age: 21 }, log)).toBe(true)
    })

    it('compares strings lexically', () => {
      expect(matchProperty(person('tier', 'gt', 'a'), { tier: 'b' }, log)).toBe(true)
    })

    it('never matches operands of different types', () => {
      expect(matchProperty(person('age', 'gt', 18), { age: '21' }, log)).toBe(false)
      expect(matchProperty(person('age', 'lt', '100'), { age: 5 }, log)).toBe(false)
    })
  })

  describe('dates', () => {
    it('accepts relative offsets on the filter', () => {
      expect(matchProperty(person('signup', 'is_date_before', '-7d'), { signup: '2000-01-01' }, log)).toBe(true)
      expect(matchProperty(person('signup', 'is_date_after', '-7d'), { signup: '2000-01-01' }, log)).toBe(false)
    })

    it('accepts absolute dates and Date properties', () => {
      expect(matchProperty(person('signup', 'is_date_after', '2020-01-01'), { signup: new Date('2021-06-01T00:00:00Z') }, log)).toBe(true)
      expect(matchProperty(person('signup', 'is_date_before', '2020-01-01'), { signup: '2019-12-31T23:59:59Z' }, log)).toBe(true)
    })

    it('is inconclusive for unparseable dates', () => {
      expect(() => matchProperty(person('signup', 'is_date_after', '2020-01-01'), { signup: 'not a date' }, log)).toThrow(InconclusiveMatchError)
      expect(() => matchProperty(person('signup', 'is_date_after', true), { signup: '2021-01-01' }, log)).toThrow(InconclusiveMatchError)
    })
  })
})

// -- parseRelativeDate -------------------------------------------------------------

describe('parseRelativeDate', () => {
  const now = new Date('2024-03-15T12:00:00.000Z')

  it('subtracts each supported interval', () => {
    expect(parseRelativeDate('-7d', now)?.toISOString()).toBe('2024-03-08T12:00:00.000Z')
    expect(parseRelativeDate('2w', now)?.toISOString()).toBe('2024-03-01T12:00:00.000Z')
    expect(parseRelativeDate('1m', now)?.toISOString()).toBe('2024-02-15T12:00:00.000Z')
    expect(parseRelativeDate('1y', now)?.toISOString()).toBe('2023-03-15T12:00:00.000Z')
    expect(parseRelativeDate('12h', now)?.toISOString()).toBe('2024-03-15T00:00:00.000Z')
  })

  it('rejects large offsets, unknown units and other text', () => {
    expect(parseRelativeDate('10000d', now)).toBeNull()
    expect(parseRelativeDate('5x', now)).toBeNull()
    expect(parseRelativeDate('2024-01-01', now)).toBeNull()
  })
})

// -- Cohorts -------------------------------------------------------------------

describe('matchCohort', () => {
  const cohorts: CohortDefinitions = {
    '7': {
      type: 'OR',
      values: [
        { type: 'AND', values: [person('country', 'exact', 'US')] },
        { type: 'AND', values: [person('email', 'icontains', '@corp.com')] },
      ],
    },
    '8': {
      type: 'AND',
      values: [person('country', 'exact', 'US', true)],
    },
  }

  it('matches when any OR branch matches', () => {
    expect(matchCohort({ type: 'cohort', key: 'id', value: 7 }, { country: 'US' }, cohorts, undefined, log)).toBe(true)
    expect(matchCohort({ type: 'cohort', key: 'id', value: '7' }, { country: 'FR', email: 'ada@corp.com' }, cohorts, undefined, log)).toBe(true)
  })

  it('does not match when every branch fails', () => {
    expect(matchCohort({ type: 'cohort', key: 'id', value: 7 }, { country: 'FR', email: 'ada@example.com' }, cohorts, undefined, log)).toBe(false)
  })

  it('applies negation on member filters', () => {
    expect(matchCohort({ type: 'cohort', key: 'id', value: 8 }, { country: 'FR' }, cohorts, undefined, log)).toBe(true)
    expect(matchCohort({ type: 'cohort', key: 'id', value: 8 }, { country: 'US' }, cohorts, undefined, log)).toBe(false)
  })

  it('is inconclusive for an unknown cohort', () => {
    expect(() => matchCohort({ type: 'cohort', key: 'id', value: 99 }, {}, cohorts, undefined, log)).toThrow(InconclusiveMatchError)
  })

  it('resolves flag filters through the resolver', () => {
    const withFlag: CohortDefinitions = {
      '9': { type: 'AND', values: [{ type: 'flag', key: '12', operator: 'flag_evaluates_to', value: true }] },
    }
    expect(matchCohort({ type: 'cohort', key: 'id', value: 9 }, {}, withFlag, () => true, log)).toBe(true)
    expect(() => matchCohort({ type: 'cohort', key: 'id', value: 9 }, {}, withFlag, undefined, log)).toThrow(InconclusiveMatchError)
  })
})

describe('matchPropertyGroup', () => {
  it('lets a conclusive OR member decide despite missing properties', () => {
    const group: PropertyGroup = { type: 'OR', values: [person('country', 'exact', 'US'), person('email', 'icontains', 'corp')] }
    expect(matchPropertyGroup(group, { email: 'ada@corp.com' }, {}, undefined, log)).toBe(true)
  })

  it('lets a failing AND member decide despite missing properties', () => {
    const group: PropertyGroup = { type: 'AND', values: [person('country', 'exact', 'US'), person('email', 'icontains', 'corp')] }
    expect(matchPropertyGroup(group, { email: 'ada@example.com' }, {}, undefined, log)).toBe(false)
  })

  it('is inconclusive when the missing member could change the answer', () => {
    const group: PropertyGroup = { type: 'AND', values: [person('country', 'exact', 'US'), person('email', 'icontains', 'corp')] }
    expect(() => matchPropertyGroup(group, { email: 'ada@corp.com' }, {}, undefined, log)).toThrow(InconclusiveMatchError)
  })

  it('matches an empty group', () => {
    expect(matchPropertyGroup({ type: 'AND', values: [] }, {}, {}, undefined, log)).toBe(true)
  })
})
