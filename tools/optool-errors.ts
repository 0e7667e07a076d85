export class OptoolNotFoundError extends Error {
  constructor(public readonly binary: string) {
    super(`Optool not found (tried "${binary}"). Please install Optool and ensure it's in your PATH.`);
    this.name = "OptoolNotFoundError";
  }
}

export class DirectoryNotFoundError extends Error {
  constructor(public readonly directory: string) {
    super(`Directory ${directory} not found.`);
    this.name = "DirectoryNotFoundError";
  }
}

export class InputFileNotResolvedError extends Error {
  constructor(
    public readonly material: string,
    public readonly temperature: number | undefined,
    public readonly directory: string,
  ) {
    const at = temperature !== undefined ? ` with temperature ${temperature}K` : "";
    super(`No .lnk file found for material ${material}${at} in ${directory}`);
    this.name = "InputFileNotResolvedError";
  }
}

export class OptoolProcessError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | undefined,
    public readonly stdout: string,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "OptoolProcessError";
  }
}

export class ExpectedOutputMissingError extends Error {
  constructor(public readonly expectedPath: string) {
    super(`Expected output file ${expectedPath} not found.`);
    this.name = "ExpectedOutputMissingError";
  }
}

export class RequestValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RequestValidationError";
  }
}
