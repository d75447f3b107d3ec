export class NoDataError extends Error {
  constructor(message = "No promo data loaded") {
    super(message);
    this.name = "NoDataError";
  }
}

export class InvalidStrategyError extends Error {
  constructor(public readonly strategy: string) {
    super(`Unknown shopping list strategy: ${strategy}`);
    this.name = "InvalidStrategyError";
  }
}

export class CsvFormatError extends Error {
  constructor(
    message: string,
    public readonly line?: number,
  ) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.name = "CsvFormatError";
  }
}

export class InvalidRecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRecordError";
  }
}

export class UnknownRetailerError extends Error {
  constructor(public readonly retailer: string) {
    super(`Retailer is not in the registry: ${retailer}`);
    this.name = "UnknownRetailerError";
  }
}
