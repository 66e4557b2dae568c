/** Error thrown when a converter is called with codes outside the contract. */
export class ConverterContractError extends Error {
  override name = "ConverterContractError";

  constructor(message: string) {
    super(message);
  }
}

/** Error thrown when a converter cannot read its input text in the requested format. */
export class ConverterInputError extends Error {
  override name = "ConverterInputError";

  readonly input: string;

  constructor(input: string, message: string) {
    super(message);
    this.input = input;
  }
}
