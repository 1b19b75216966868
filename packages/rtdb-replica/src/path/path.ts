/**
 * @file Path Model
 *
 * Immutable addresses into the database tree. A path is an ordered list of
 * non-empty segments; the root is the empty list.
 *
 * Segment rules:
 * - no empty segments (`a//b`)
 * - no control characters (ASCII 0-31 and DEL)
 * - none of the characters the database forbids in keys: `/ . # $ [ ]`
 *
 * @module rtdb-replica/path/path
 */

import { InvalidPathError } from '../errors.js'

// =============================================================================
// Constants for Validation
// =============================================================================

/**
 * Control characters, including the null byte and DEL.
 */
const CONTROL_CHARS_REGEX = /[\x00-\x1F\x7F]/

/**
 * Characters that may not appear in a key.
 */
const FORBIDDEN_CHARS_REGEX = /[/.#$[\]]/

// =============================================================================
// Segment Validation
// =============================================================================

/**
 * Validates a single path segment.
 *
 * @param segment - The segment to validate
 * @param input - The full input (for error messages)
 * @throws InvalidPathError if the segment is invalid
 */
function validateSegment(segment: string, input: string): void {
  if (segment === '') {
    throw new InvalidPathError(`Invalid path '${input}': empty path segment`, input)
  }

  if (CONTROL_CHARS_REGEX.test(segment)) {
    throw new InvalidPathError(`Invalid path '${input}': contains control characters`, input)
  }

  const forbidden = FORBIDDEN_CHARS_REGEX.exec(segment)
  if (forbidden) {
    throw new InvalidPathError(
      `Invalid path '${input}': segment '${segment}' contains forbidden character '${forbidden[0]}'`,
      input
    )
  }
}

/**
 * Whether `segment` is usable as a single key.
 *
 * @example
 * ```typescript
 * isValidKey('scores') // true
 * isValidKey('a/b')    // false
 * isValidKey('')       // false
 * ```
 */
export function isValidKey(segment: string): boolean {
  return (
    segment !== '' &&
    !CONTROL_CHARS_REGEX.test(segment) &&
    !FORBIDDEN_CHARS_REGEX.test(segment)
  )
}

// =============================================================================
// Path
// =============================================================================

/**
 * An immutable location in the tree.
 *
 * Equality is structural: use {@link Path.equals}, not `===`.
 *
 * @example
 * ```typescript
 * const scores = Path.parse('/games/chess/scores')
 * scores.child('alice').toString() // '/games/chess/scores/alice'
 * scores.parent()?.toString()      // '/games/chess'
 * Path.root.isPrefixOf(scores)     // true
 * ```
 */
export class Path {
  /** The root location (`/`). */
  static readonly root: Path = new Path([])

  /** The segments of this path, outermost first */
  readonly segments: readonly string[]

  private constructor(segments: readonly string[]) {
    this.segments = Object.freeze([...segments])
  }

  /**
   * Parses a `/`-delimited string.
   *
   * One leading and one trailing slash are optional, so `'a/b'`, `'/a/b'`
   * and `'/a/b/'` all parse to the same path. `''` and `'/'` are the root.
   *
   * @throws InvalidPathError on empty segments, control characters or
   *   forbidden key characters
   */
  static parse(input: string): Path {
    if (input === '' || input === '/') {
      return Path.root
    }

    let body = input
    if (body.startsWith('/')) {
      body = body.slice(1)
    }
    if (body.endsWith('/')) {
      body = body.slice(0, -1)
    }

    const segments = body.split('/')
    for (const segment of segments) {
      validateSegment(segment, input)
    }
    return new Path(segments)
  }

  /**
   * Accepts either a path or a string to parse.
   */
  static from(path: Path | string): Path {
    return typeof path === 'string' ? Path.parse(path) : path
  }

  /** Whether this is the root */
  get isRoot(): boolean {
    return this.segments.length === 0
  }

  /** The last segment, or `undefined` at the root */
  get key(): string | undefined {
    return this.segments[this.segments.length - 1]
  }

  /** Number of segments */
  get depth(): number {
    return this.segments.length
  }

  /**
   * Appends one or more single segments.
   *
   * @throws InvalidPathError if a segment is empty or contains `/`
   */
  child(...segments: string[]): Path {
    if (segments.length === 0) {
      return this
    }
    for (const segment of segments) {
      validateSegment(segment, segment)
    }
    return new Path([...this.segments, ...segments])
  }

  /**
   * Appends a relative path, which may span several segments.
   */
  join(relative: Path | string): Path {
    const other = Path.from(relative)
    if (other.isRoot) {
      return this
    }
    if (this.isRoot) {
      return other
    }
    return new Path([...this.segments, ...other.segments])
  }

  /** The enclosing location, or `undefined` at the root */
  parent(): Path | undefined {
    if (this.isRoot) {
      return undefined
    }
    return new Path(this.segments.slice(0, -1))
  }

  /**
   * Whether this path's segments are a prefix of `other`'s. A path is a
   * prefix of itself.
   */
  isPrefixOf(other: Path): boolean {
    if (this.segments.length > other.segments.length) {
      return false
    }
    return this.segments.every((segment, index) => other.segments[index] === segment)
  }

  /**
   * The part of this path below `prefix`.
   *
   * @returns The relative path, or `undefined` if `prefix` is not a prefix
   */
  relativeTo(prefix: Path): Path | undefined {
    if (!prefix.isPrefixOf(this)) {
      return undefined
    }
    return new Path(this.segments.slice(prefix.segments.length))
  }

  /** Structural equality */
  equals(other: Path): boolean {
    return (
      this.segments.length === other.segments.length &&
      this.isPrefixOf(other)
    )
  }

  /**
   * Canonical form: leading slash, no trailing slash, `/` for the root.
   */
  toString(): string {
    return `/${this.segments.join('/')}`
  }

  /**
   * Percent-encoded form for building request URLs (no leading slash).
   */
  toUrlPath(): string {
    return this.segments.map((segment) => encodeURIComponent(segment)).join('/')
  }

  toJSON(): string {
    return this.toString()
  }
}
