/**
 * Custom Error Classes for Matchledger
 */

import type { EntityType } from './types.js';

/**
 * Base class for every error the ledger raises on purpose
 */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Stored content no longer matches what the ledger recorded
 */
export class IntegrityError extends LedgerError {}

/**
 * Error thrown when a record's recomputed hash differs from its stored hash
 */
export class HashMismatchError extends IntegrityError {
  public readonly entityType: EntityType;
  public readonly id: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(entityType: EntityType, id: string, expected: string, actual: string) {
    super(
      `Hash mismatch for ${entityType} ${id}: ` +
      `expected ${expected.slice(0, 16)}..., got ${actual.slice(0, 16)}...`
    );
    this.entityType = entityType;
    this.id = id;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown on any attempt to change or remove a stored record
 */
export class ImmutabilityViolationError extends LedgerError {
  public readonly operation: string;
  public readonly entityType: EntityType;

  constructor(operation: string, entityType: EntityType, detail?: string) {
    super(
      `Cannot ${operation} ${entityType}: records are append-only` +
      (detail ? ` (${detail})` : '')
    );
    this.operation = operation;
    this.entityType = entityType;
  }
}

export class NotFoundError extends LedgerError {
  public readonly entityType: EntityType;
  public readonly id: string;

  constructor(entityType: EntityType, id: string) {
    super(`${entityType} not found: ${id}`);
    this.entityType = entityType;
    this.id = id;
  }
}

/**
 * Error thrown when an insert points at a record that does not exist,
 * or at one that cannot legally be referenced
 */
export class ReferentialError extends LedgerError {
  public readonly entityType: EntityType;
  public readonly field: string;
  public readonly referencedId: string;

  constructor(entityType: EntityType, field: string, referencedId: string, reason = 'does not exist') {
    super(`Cannot insert ${entityType}: ${field} ${referencedId} ${reason}`);
    this.entityType = entityType;
    this.field = field;
    this.referencedId = referencedId;
  }
}

export class UniquenessError extends LedgerError {
  public readonly entityType: EntityType;
  public readonly key: string;
  public readonly value: string;

  constructor(entityType: EntityType, key: string, value: string, reason?: string) {
    super(
      `Cannot insert ${entityType}: ${key} ${value} is already taken` +
      (reason ? ` (${reason})` : '')
    );
    this.entityType = entityType;
    this.key = key;
    this.value = value;
  }
}

export class InvalidTransitionError extends LedgerError {
  public readonly proposalId: string;
  public readonly from: string;
  public readonly to: string;

  constructor(proposalId: string, from: string, to: string) {
    super(`Proposal ${proposalId} cannot move from '${from}' to '${to}'`);
    this.proposalId = proposalId;
    this.from = from;
    this.to = to;
  }
}

/**
 * Error thrown when a record or external payload is malformed
 */
export class ValidationError extends LedgerError {
  public readonly entityType: EntityType | 'payload';
  public readonly issues: string[];

  constructor(entityType: EntityType | 'payload', issues: string[]) {
    super(`Invalid ${entityType}: ${issues.join('; ')}`);
    this.entityType = entityType;
    this.issues = issues;
  }
}

/**
 * Error thrown when a value cannot be put into canonical form
 */
export class SerializationError extends LedgerError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot serialize value at ${path || '<root>'}: ${reason}`);
    this.path = path;
  }
}

export class ConfigurationError extends LedgerError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

/**
 * Error thrown when a stored row can no longer be decoded into its record shape
 */
export class RecordDecodeError extends IntegrityError {
  public readonly entityType: EntityType;
  public readonly id: string;
  public readonly reason: string;

  constructor(entityType: EntityType, id: string, reason: string) {
    super(`Stored ${entityType} ${id} is unreadable: ${reason}`);
    this.entityType = entityType;
    this.id = id;
    this.reason = reason;
  }
}
