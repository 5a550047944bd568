export class ReconciliationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface MalformedInputDetails {
  column?: string;
  rowNumber?: number;
  key?: string;
}

/**
 * Raised when a ledger cannot be turned into records: a required column is
 * missing, a quantity cell is not a non-negative integer, an identifier is
 * blank, or a duplicate identifier is rejected by policy.
 */
export class MalformedInputError extends ReconciliationError {
  readonly column?: string;
  readonly rowNumber?: number;
  readonly key?: string;

  constructor(message: string, details: MalformedInputDetails = {}) {
    super(message);
    this.column = details.column;
    this.rowNumber = details.rowNumber;
    this.key = details.key;
  }
}

// A row reached the emitter without a status. Indicates a classifier defect.
export class SerializationError extends ReconciliationError {
  constructor(
    message: string,
    readonly key: string,
  ) {
    super(message);
  }
}
