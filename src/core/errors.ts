export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A command to one member failed; the rest of the group is unaffected. */
export class DispatchError extends Error {
  constructor(
    readonly memberId: string,
    cause: unknown,
  ) {
    super(`Command to ${memberId} failed: ${asErrorMessage(cause)}`, { cause });
    this.name = "DispatchError";
  }
}

export class GroupNotFoundError extends Error {
  constructor(readonly groupId: string) {
    super(`Group not found: ${groupId}`);
    this.name = "GroupNotFoundError";
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return "Unknown error";
}
