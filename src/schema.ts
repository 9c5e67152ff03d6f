import { z } from 'zod'
import { DefinitionParseError } from './errors.js'
import { logger as defaultLogger, type Logger } from './logger.js'
import type {
  CohortDefinitions,
  ConditionGroup,
  FlagDefinition,
  FlagDefinitions,
  FlagDefinitionsPayload,
  FlagPatch,
  FlagPropertyFilter,
  GroupPropertyFilter,
  JsonValue,
  PropertyFilter,
  PropertyGroup,
  PropertyOperator,
  RemoteEvaluationResponse,
  RemoteFlag,
} from './types.js'

const PROPERTY_OPERATORS = [
  'exact',
  'is_not',
  'is_set',
  'is_not_set',
  'icontains',
  'not_icontains',
  'regex',
  'not_regex',
  'gt',
  'gte',
  'lt',
  'lte',
  'is_date_before',
  'is_date_after',
] as const satisfies readonly PropertyOperator[]

const OperatorSchema = z.enum(PROPERTY_OPERATORS)

const RawFilterSchema = z.object({
  key: z.union([z.string(), z.number()]).transform(String),
  type: z.enum(['person', 'group', 'cohort', 'flag']).nullish(),
  operator: z.string().nullish(),
  value: z.unknown(),
  negation: z.boolean().nullish(),
  group_type_index: z.number().int().nullish(),
})

/** Parses one wire filter into the tagged {@link PropertyFilter} union. */
export const PropertyFilterSchema: z.ZodType<PropertyFilter, z.ZodTypeDef, unknown> = RawFilterSchema.transform(
  (raw, ctx): PropertyFilter => {
    const negation = raw.negation ?? undefined
    const type = raw.type ?? 'person'

    if (type === 'flag') {
      const filter: FlagPropertyFilter = {
        type,
        key: raw.key,
        operator: raw.operator ?? 'flag_evaluates_to',
        value: raw.value,
      }
      if (negation !== undefined) filter.negation = negation
      return filter
    }

    if (type === 'cohort') {
      if (typeof raw.value !== 'string' && typeof raw.value !== 'number') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `cohort filter value must be an id, got ${typeof raw.value}` })
        return z.NEVER
      }
      return negation !== undefined
        ? { type, key: raw.key, value: raw.value, negation }
        : { type, key: raw.key, value: raw.value }
    }

    const operator = OperatorSchema.safeParse(raw.operator ?? 'exact')
    if (!operator.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown operator '${raw.operator}'` })
      return z.NEVER
    }

    if (type === 'group') {
      const filter: GroupPropertyFilter = { type, key: raw.key, operator: operator.data, value: raw.value }
      if (raw.group_type_index != null) filter.groupTypeIndex = raw.group_type_index
      if (negation !== undefined) filter.negation = negation
      return filter
    }

    return negation !== undefined
      ? { type, key: raw.key, operator: operator.data, value: raw.value, negation }
      : { type, key: raw.key, operator: operator.data, value: raw.value }
  },
)

/** Parses a (possibly nested) cohort property group. */
export const PropertyGroupSchema: z.ZodType<PropertyGroup, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .object({
      type: z.enum(['AND', 'OR']),
      values: z.array(z.unknown()).nullish(),
    })
    .transform((raw, ctx): PropertyGroup => {
      const values = raw.values ?? []
      const first = values[0]
      if (typeof first === 'object' && first !== null && 'values' in first) {
        const groups: PropertyGroup[] = []
        for (const value of values) {
          const result = PropertyGroupSchema.safeParse(value)
          if (!result.success) return reportIssues(ctx, result.error)
          groups.push(result.data)
        }
        return { type: raw.type, values: groups }
      }
      const filters: PropertyFilter[] = []
      for (const value of values) {
        const result = PropertyFilterSchema.safeParse(value)
        if (!result.success) return reportIssues(ctx, result.error)
        filters.push(result.data)
      }
      return { type: raw.type, values: filters }
    }),
)

function reportIssues(ctx: z.RefinementCtx, error: z.ZodError): never {
  for (const issue of error.issues) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path })
  }
  return z.NEVER
}

const ConditionGroupSchema = z
  .object({
    properties: z.array(PropertyFilterSchema).nullish(),
    rollout_percentage: z.number().min(0).max(100).nullish(),
    variant: z.string().nullish(),
  })
  .transform((raw): ConditionGroup => {
    const group: ConditionGroup = {
      properties: raw.properties ?? [],
      rolloutPercentage: raw.rollout_percentage ?? null,
    }
    if (raw.variant) group.variant = raw.variant
    return group
  })

const VariantSchema = z
  .object({
    key: z.string(),
    rollout_percentage: z.number().min(0).max(100),
  })
  .transform((raw) => ({ key: raw.key, rolloutPercentage: raw.rollout_percentage }))

export const FlagDefinitionSchema: z.ZodType<FlagDefinition, z.ZodTypeDef, unknown> = z
  .object({
    id: z.number().int(),
    key: z.string().min(1),
    active: z.boolean().default(false),
    ensure_experience_continuity: z.boolean().nullish(),
    filters: z
      .object({
        groups: z.array(ConditionGroupSchema).nullish(),
        multivariate: z.object({ variants: z.array(VariantSchema).nullish() }).nullish(),
        aggregation_group_type_index: z.number().int().nullish(),
        payloads: z.record(z.unknown()).nullish(),
      })
      .nullish(),
  })
  .transform((raw): FlagDefinition => {
    const filters = raw.filters
    const definition: FlagDefinition = {
      id: raw.id,
      key: raw.key,
      active: raw.active,
      ensureExperienceContinuity: raw.ensure_experience_continuity ?? false,
      filters: { groups: filters?.groups ?? [] },
    }
    const variants = filters?.multivariate?.variants
    if (variants && variants.length > 0) definition.filters.multivariate = { variants }
    if (filters?.aggregation_group_type_index != null) {
      definition.filters.aggregationGroupTypeIndex = filters.aggregation_group_type_index
    }
    if (filters?.payloads) definition.filters.payloads = stringifyPayloads(filters.payloads)
    return definition
  })

function stringifyPayloads(payloads: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(payloads)) {
    if (value === undefined || value === null) continue
    out[key] = typeof value === 'string' ? value : JSON.stringify(value)
  }
  return out
}

export const FlagDefinitionsPayloadSchema = z.object({
  flags: z.array(z.unknown()),
  group_type_mapping: z.record(z.string()).nullish(),
  cohorts: z.record(z.unknown()).nullish(),
})

/**
 * Checks the top-level shape of a definitions payload.
 * Throws {@link DefinitionParseError} when `flags` is not an array.
 */
export function normalizeDefinitionsPayload(data: unknown): FlagDefinitionsPayload {
  const top = FlagDefinitionsPayloadSchema.safeParse(data)
  if (!top.success) {
    throw new DefinitionParseError(`invalid flag definitions payload: ${top.error.issues.map((i) => i.message).join('; ')}`)
  }
  return {
    flags: top.data.flags,
    group_type_mapping: top.data.group_type_mapping ?? {},
    cohorts: top.data.cohorts ?? {},
  }
}

/**
 * Parses a definitions payload. Flags and cohorts that fail validation are
 * skipped with a warning so the rest of the set still loads.
 */
export function parseFlagDefinitions(data: unknown, log: Logger = defaultLogger): FlagDefinitions {
  const payload = normalizeDefinitionsPayload(data)

  const flags: FlagDefinition[] = []
  for (const rawFlag of payload.flags) {
    const parsed = FlagDefinitionSchema.safeParse(rawFlag)
    if (parsed.success) {
      flags.push(parsed.data)
    } else {
      log.warn({ flag: describeRawFlag(rawFlag), issues: parsed.error.issues }, 'Skipping invalid flag definition')
    }
  }

  const cohorts: CohortDefinitions = {}
  for (const [id, rawGroup] of Object.entries(payload.cohorts)) {
    const parsed = PropertyGroupSchema.safeParse(rawGroup)
    if (parsed.success) {
      cohorts[id] = parsed.data
    } else {
      log.warn({ cohort: id, issues: parsed.error.issues }, 'Skipping invalid cohort definition')
    }
  }

  return { flags, groupTypeMapping: payload.group_type_mapping, cohorts }
}

/** Parses one flag definition, or returns undefined and logs when invalid. */
export function parseFlagDefinition(data: unknown, log: Logger = defaultLogger): FlagDefinition | undefined {
  const parsed = FlagDefinitionSchema.safeParse(data)
  if (parsed.success) return parsed.data
  log.warn({ flag: describeRawFlag(data), issues: parsed.error.issues }, 'Skipping invalid flag definition')
  return undefined
}

function describeRawFlag(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'key' in raw) return String(raw.key)
  return '<unknown>'
}

export const FlagPatchSchema: z.ZodType<FlagPatch, z.ZodTypeDef, unknown> = z
  .object({
    key: z.string().min(1),
    deleted: z.boolean().optional(),
  })
  .passthrough()

// -- Remote evaluation ----------------------------------------------------------

const RemoteFlagSchema = z.object({
  key: z.string(),
  enabled: z.boolean(),
  variant: z.string().nullish(),
  metadata: z.object({ payload: z.unknown() }).partial().nullish(),
})

const RemoteEvaluationSchema = z.object({
  flags: z.record(RemoteFlagSchema).default({}),
  errorsWhileComputingFlags: z.boolean().default(false),
  quotaLimited: z.array(z.string()).nullish(),
  requestId: z.string().nullish(),
})

export interface ParsedRemoteEvaluation extends RemoteEvaluationResponse {
  quotaLimited: string[]
}

/** Parses a remote evaluation response body. */
export function parseRemoteEvaluation(data: unknown): ParsedRemoteEvaluation {
  const parsed = RemoteEvaluationSchema.parse(data)
  const flags: Record<string, RemoteFlag> = {}
  for (const [key, raw] of Object.entries(parsed.flags)) {
    const flag: RemoteFlag = { key: raw.key, enabled: raw.enabled }
    if (raw.variant) flag.variant = raw.variant
    const payload = raw.metadata?.payload
    if (payload !== undefined && payload !== null) flag.payload = parsePayload(payload)
    flags[key] = flag
  }
  const response: ParsedRemoteEvaluation = {
    flags,
    errorsWhileComputingFlags: parsed.errorsWhileComputingFlags,
    quotaLimited: parsed.quotaLimited ?? [],
  }
  if (parsed.requestId) response.requestId = parsed.requestId
  return response
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
)

/** Payloads arrive as JSON strings; anything that is not JSON is returned as the raw string. */
export function parsePayload(payload: unknown): JsonValue | undefined {
  if (typeof payload === 'string') {
    try {
      const decoded = JsonValueSchema.safeParse(JSON.parse(payload))
      return decoded.success ? decoded.data : payload
    } catch {
      return payload
    }
  }
  const value = JsonValueSchema.safeParse(payload)
  return value.success ? value.data : undefined
}
