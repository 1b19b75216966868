/**
 * @file Query Spec
 *
 * Ordering, bounding and limiting constraints for a subscription, and their
 * rendering into the query parameters of the REST streaming protocol.
 *
 * Builders are immutable: every setter returns a new builder, so a partially
 * built query can be reused as a template. All validation happens in
 * {@link QueryBuilder.build}, which throws {@link InvalidQueryError} naming the
 * fields in conflict.
 *
 * @example
 * ```typescript
 * const top10 = query().orderByChild('score').limitToLast(10).build()
 * top10.toWireParameters()
 * // { orderBy: '"score"', limitToLast: '10' }
 * ```
 *
 * @module rtdb-replica/query/query-spec
 */

import { z } from 'zod'
import { InvalidPathError, InvalidQueryError } from '../errors.js'
import { Path } from '../path/path.js'

// =============================================================================
// Types
// =============================================================================

/**
 * How children are ordered before bounds and limits apply.
 */
export type OrderBy =
  | { readonly type: 'key' }
  | { readonly type: 'value' }
  | { readonly type: 'priority' }
  | { readonly type: 'child'; readonly path: Path }

/**
 * Values accepted by `startAt`, `endAt` and `equalTo`.
 */
export type BoundValue = string | number | boolean | null

/** Names of the builder setters, used in error reports */
export type QueryField =
  | 'orderByKey'
  | 'orderByValue'
  | 'orderByPriority'
  | 'orderByChild'
  | 'limitToFirst'
  | 'limitToLast'
  | 'startAt'
  | 'endAt'
  | 'equalTo'

type Constraint =
  | { readonly field: 'orderByKey' | 'orderByValue' | 'orderByPriority' }
  | { readonly field: 'orderByChild'; readonly child: string }
  | { readonly field: 'limitToFirst' | 'limitToLast'; readonly limit: number }
  | { readonly field: 'startAt' | 'endAt' | 'equalTo'; readonly value: BoundValue }

const ORDERING_FIELDS: ReadonlySet<QueryField> = new Set([
  'orderByKey',
  'orderByValue',
  'orderByPriority',
  'orderByChild',
])

// =============================================================================
// Value Domains
// =============================================================================

const finiteNumber = z.number().finite()

const limitSchema = z.number().int().nonnegative()

/**
 * Bound values each ordering can compare against.
 */
const BOUND_SCHEMAS: Record<OrderBy['type'], z.ZodType<BoundValue>> = {
  key: z.string(),
  priority: z.union([z.null(), finiteNumber, z.string()]),
  value: z.union([z.null(), z.boolean(), finiteNumber, z.string()]),
  child: z.union([z.null(), z.boolean(), finiteNumber, z.string()]),
}

const WIRE_ORDER_BY: Record<Exclude<OrderBy['type'], 'child'>, string> = {
  key: '$key',
  value: '$value',
  priority: '$priority',
}

// =============================================================================
// QuerySpec
// =============================================================================

/**
 * A validated, immutable set of query constraints.
 *
 * Obtain one from {@link QueryBuilder.build}.
 */
export class QuerySpec {
  readonly orderBy?: OrderBy
  readonly limitToFirst?: number
  readonly limitToLast?: number
  readonly startAt?: BoundValue
  readonly endAt?: BoundValue
  readonly equalTo?: BoundValue

  /** @internal */
  constructor(fields: {
    orderBy?: OrderBy
    limitToFirst?: number
    limitToLast?: number
    startAt?: BoundValue
    endAt?: BoundValue
    equalTo?: BoundValue
  }) {
    this.orderBy = fields.orderBy
    this.limitToFirst = fields.limitToFirst
    this.limitToLast = fields.limitToLast
    this.startAt = fields.startAt
    this.endAt = fields.endAt
    this.equalTo = fields.equalTo
    Object.freeze(this)
  }

  /** Whether no constraint is set */
  get isEmpty(): boolean {
    return this.orderBy === undefined
  }

  /**
   * Renders the query parameters the REST protocol expects.
   *
   * Ordering and bounds are JSON-encoded; limits are plain integers. The
   * result is the only place query semantics reach the network.
   *
   * @example
   * ```typescript
   * query().orderByKey().startAt('b').endAt('d').build().toWireParameters()
   * // { orderBy: '"$key"', startAt: '"b"', endAt: '"d"' }
   * ```
   */
  toWireParameters(): Record<string, string> {
    const params: Record<string, string> = {}
    if (this.orderBy === undefined) {
      return params
    }

    params['orderBy'] = JSON.stringify(
      this.orderBy.type === 'child'
        ? this.orderBy.path.segments.join('/')
        : WIRE_ORDER_BY[this.orderBy.type]
    )
    if (this.startAt !== undefined) {
      params['startAt'] = JSON.stringify(this.startAt)
    }
    if (this.endAt !== undefined) {
      params['endAt'] = JSON.stringify(this.endAt)
    }
    if (this.equalTo !== undefined) {
      params['equalTo'] = JSON.stringify(this.equalTo)
    }
    if (this.limitToFirst !== undefined) {
      params['limitToFirst'] = String(this.limitToFirst)
    }
    if (this.limitToLast !== undefined) {
      params['limitToLast'] = String(this.limitToLast)
    }
    return params
  }

  /** Structural equality, by wire rendering */
  equals(other: QuerySpec): boolean {
    return JSON.stringify(this.toWireParameters()) === JSON.stringify(other.toWireParameters())
  }
}

// =============================================================================
// QueryBuilder
// =============================================================================

/**
 * Chainable, immutable query builder.
 */
export class QueryBuilder {
  private readonly constraints: readonly Constraint[]

  constructor(constraints: readonly Constraint[] = []) {
    this.constraints = Object.freeze([...constraints])
  }

  orderByKey(): QueryBuilder {
    return this.with({ field: 'orderByKey' })
  }

  orderByValue(): QueryBuilder {
    return this.with({ field: 'orderByValue' })
  }

  orderByPriority(): QueryBuilder {
    return this.with({ field: 'orderByPriority' })
  }

  /**
   * Orders by the value of a child key, which may be a nested path
   * (`'stats/score'`).
   */
  orderByChild(child: string): QueryBuilder {
    return this.with({ field: 'orderByChild', child })
  }

  limitToFirst(limit: number): QueryBuilder {
    return this.with({ field: 'limitToFirst', limit })
  }

  limitToLast(limit: number): QueryBuilder {
    return this.with({ field: 'limitToLast', limit })
  }

  startAt(value: BoundValue): QueryBuilder {
    return this.with({ field: 'startAt', value })
  }

  endAt(value: BoundValue): QueryBuilder {
    return this.with({ field: 'endAt', value })
  }

  equalTo(value: BoundValue): QueryBuilder {
    return this.with({ field: 'equalTo', value })
  }

  /**
   * Validates the constraints and produces a {@link QuerySpec}.
   *
   * @throws InvalidQueryError if selectors conflict, a constraint is
   *   repeated, bounds or limits are set without an ordering, or a value is
   *   outside its domain
   */
  build(): QuerySpec {
    const fields = this.constraints.map((constraint) => constraint.field)

    const orderings = fields.filter((field) => ORDERING_FIELDS.has(field))
    if (orderings.length > 1) {
      throw new InvalidQueryError(
        `Only one ordering may be set, got ${orderings.join(', ')}`,
        orderings
      )
    }

    const limits = fields.filter((field) => field === 'limitToFirst' || field === 'limitToLast')
    if (limits.length > 1) {
      throw new InvalidQueryError(
        `Only one limit may be set, got ${limits.join(', ')}`,
        limits
      )
    }

    for (const bound of ['startAt', 'endAt', 'equalTo'] as const) {
      if (fields.filter((field) => field === bound).length > 1) {
        throw new InvalidQueryError(`${bound} may only be set once`, [bound, bound])
      }
    }

    if (fields.includes('equalTo')) {
      const ranged = fields.filter((field) => field === 'startAt' || field === 'endAt')
      if (ranged.length > 0) {
        throw new InvalidQueryError(
          `equalTo cannot be combined with ${ranged.join(', ')}`,
          ['equalTo', ...ranged]
        )
      }
    }

    const ordering = this.constraints.find(
      (constraint) => ORDERING_FIELDS.has(constraint.field)
    )
    const orderBy = ordering ? this.resolveOrderBy(ordering) : undefined

    if (orderBy === undefined) {
      const filters = fields.filter((field) => !ORDERING_FIELDS.has(field))
      if (filters.length > 0) {
        throw new InvalidQueryError(
          `${filters.join(', ')} requires an ordering (orderByKey, orderByValue, orderByPriority or orderByChild)`,
          filters
        )
      }
      return new QuerySpec({})
    }

    const spec: {
      orderBy: OrderBy
      limitToFirst?: number
      limitToLast?: number
      startAt?: BoundValue
      endAt?: BoundValue
      equalTo?: BoundValue
    } = { orderBy }

    for (const constraint of this.constraints) {
      switch (constraint.field) {
        case 'limitToFirst':
        case 'limitToLast':
          if (!limitSchema.safeParse(constraint.limit).success) {
            throw new InvalidQueryError(
              `${constraint.field} must be a non-negative integer, got ${constraint.limit}`,
              [constraint.field]
            )
          }
          spec[constraint.field] = constraint.limit
          break
        case 'startAt':
        case 'endAt':
        case 'equalTo':
          if (!BOUND_SCHEMAS[orderBy.type].safeParse(constraint.value).success) {
            throw new InvalidQueryError(
              `${constraint.field}(${JSON.stringify(constraint.value)}) is not comparable under ${ordering?.field}`,
              [ordering?.field ?? 'orderBy', constraint.field]
            )
          }
          spec[constraint.field] = constraint.value
          break
        default:
          break
      }
    }

    return new QuerySpec(spec)
  }

  private with(constraint: Constraint): QueryBuilder {
    return new QueryBuilder([...this.constraints, constraint])
  }

  private resolveOrderBy(constraint: Constraint): OrderBy {
    switch (constraint.field) {
      case 'orderByKey':
        return { type: 'key' }
      case 'orderByValue':
        return { type: 'value' }
      case 'orderByPriority':
        return { type: 'priority' }
      case 'orderByChild': {
        let path: Path
        try {
          path = Path.parse(constraint.child)
        } catch (error) {
          if (error instanceof InvalidPathError) {
            throw new InvalidQueryError(`orderByChild: ${error.message}`, ['orderByChild'])
          }
          throw error
        }
        if (path.isRoot) {
          throw new InvalidQueryError('orderByChild requires a child key', ['orderByChild'])
        }
        return { type: 'child', path }
      }
      default:
        throw new InvalidQueryError(`${constraint.field} is not an ordering`, [constraint.field])
    }
  }
}

/**
 * Starts a new, empty query builder.
 */
export function query(): QueryBuilder {
  return new QueryBuilder()
}
