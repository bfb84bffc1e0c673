import { type LookupQuery, describeQuery } from './entry.js';

/** Base class for every failure raised while resolving a credential. */
export class CredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialError';
  }
}

/** The credential tool executable could not be found. */
export class ToolNotFoundError extends CredentialError {
  public readonly cliPath: string;

  constructor(cliPath: string) {
    super(`Credential tool ${JSON.stringify(cliPath)} not found. Is rbw installed and on PATH?`);
    this.name = 'ToolNotFoundError';
    this.cliPath = cliPath;
  }
}

/** The store is locked; the user has to unlock it themselves. */
export class StoreLockedError extends CredentialError {
  public readonly stderr: string;

  constructor(message = "rbw vault locked. Run 'rbw unlock'.", stderr = '') {
    super(message);
    this.name = 'StoreLockedError';
    this.stderr = stderr;
  }
}

/** The tool failed for a reason other than a locked store. */
export class ToolExecutionError extends CredentialError {
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr: string) {
    super(message);
    this.name = 'ToolExecutionError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/** The tool produced output this adapter does not understand. */
export class ParseError extends CredentialError {
  /** 1-based line of the listing that failed, when the failure is line-specific. */
  public readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = 'ParseError';
    this.line = line;
  }
}

export class NotFoundError extends CredentialError {
  public readonly query: LookupQuery;

  constructor(query: LookupQuery) {
    super(`No credential named ${describeQuery(query)}`);
    this.name = 'NotFoundError';
    this.query = query;
  }
}

/**
 * More than one entry matched. The candidate ids are listed so the caller can
 * add a folder qualifier.
 */
export class AmbiguousMatchError extends CredentialError {
  public readonly query: LookupQuery;
  public readonly candidateIds: readonly string[];

  constructor(query: LookupQuery, candidateIds: readonly string[]) {
    super(
      `Multiple credentials match ${describeQuery(query)}. Add a folder to narrow it down: ${JSON.stringify(candidateIds)}`,
    );
    this.name = 'AmbiguousMatchError';
    this.query = query;
    this.candidateIds = Object.freeze([...candidateIds]);
  }
}

export class FieldNotFoundError extends CredentialError {
  public readonly field: string;
  public readonly entryId: string;

  constructor(field: string, entryId: string) {
    super(`Field ${JSON.stringify(field)} does not exist in entry ${entryId}`);
    this.name = 'FieldNotFoundError';
    this.field = field;
    this.entryId = entryId;
  }
}

/** Lookup terms or options rejected before any tool call was made. */
export class LookupOptionsError extends CredentialError {
  constructor(message: string) {
    super(message);
    this.name = 'LookupOptionsError';
  }
}
