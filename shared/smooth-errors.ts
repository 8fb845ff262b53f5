export class SmoothDimsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SmoothDimsError";
  }
}

export class InvalidArgumentError extends SmoothDimsError {
  argument: string;
  constructor(argument: string, message: string) {
    super(`${argument}: ${message}`);
    this.argument = argument;
    this.name = "InvalidArgumentError";
  }
}

export type LookupSide = "larger" | "smaller";

export class OutOfRangeError extends SmoothDimsError {
  query: number;
  side: LookupSide;
  constructor(query: number, side: LookupSide, message: string) {
    super(message);
    this.query = query;
    this.side = side;
    this.name = "OutOfRangeError";
  }
}

export class ResolverNotFoundError extends SmoothDimsError {
  resolver: string;
  constructor(resolver: string) {
    super(`Resolver ${resolver} not found`);
    this.resolver = resolver;
    this.name = "ResolverNotFoundError";
  }
}
