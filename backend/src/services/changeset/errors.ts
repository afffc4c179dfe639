export class ChangesetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChangesetError";
  }
}

/** Malformed patch: unsupported op, bad path, or a changeset that fails validation. */
export class PatchSchemaError extends ChangesetError {
  constructor(message: string) {
    super(message);
    this.name = "PatchSchemaError";
  }
}

export class RequiredFieldMissingError extends ChangesetError {
  constructor(
    public readonly field: string,
    public readonly rowIndex: number
  ) {
    super(`New testcase #${rowIndex} is missing required field "${field}"`);
    this.name = "RequiredFieldMissingError";
  }
}
