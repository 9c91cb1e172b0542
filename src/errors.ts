/**
 * git-idm error types
 *
 * Commands map these onto exit codes and `ERROR:` output; anything else
 * that escapes a command is treated as an internal error.
 */

/**
 * Bad or conflicting arguments, a reserved id, an incomplete first-time
 * identity, or an invalid tool configuration file.
 */
export class ValidationError extends Error {
  override readonly name = 'ValidationError' as const;

  constructor(message: string) {
    super(message);
  }
}

export type NotFoundKind = 'identity' | 'section' | 'key';

/**
 * Operating on something that does not exist.
 *
 * The store raises it with kind `section` or `key`; the repository and
 * engine translate it to kind `identity` where an id was asked for.
 */
export class NotFoundError extends Error {
  override readonly name = 'NotFoundError' as const;

  constructor(
    public readonly kind: NotFoundKind,
    public readonly subject: string,
  ) {
    super(kind === 'identity' ? `identity "${subject}" does not exist` : `no such ${kind}: ${subject}`);
  }
}

/** Fields compared between the active identity and the live configuration. */
export type DriftField = 'name' | 'email' | 'sshCommand';

export interface Discrepancy {
  field: DriftField;
  /** Live configuration key that disagrees */
  key: string;
  /** Value stored on the identity ('' when unset) */
  expected: string;
  /** Value found in the live configuration ('' when unset) */
  actual: string;
}

/**
 * The live configuration disagrees with the active identity.
 *
 * Raised once, after every discrepancy has been reported.
 */
export class DriftError extends Error {
  override readonly name = 'DriftError' as const;

  constructor(
    public readonly activeId: string,
    public readonly discrepancies: Discrepancy[],
  ) {
    const fields = discrepancies.map((d) => d.field).join(', ');
    super(
      `live configuration differs from identity "${activeId}" (${fields}); ` +
      `run \`git-idm use ${activeId}\` to fix`,
    );
  }
}

/**
 * An external resource failed: an unreadable key file, or a git / ssh-add
 * process that exited unexpectedly.
 */
export class IOError extends Error {
  override readonly name = 'IOError' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
