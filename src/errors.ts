export class QrCodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QrCodeError";
  }
}

// The encoded text does not fit the requested version and error correction level.
export class CapacityExceededError extends QrCodeError {
  constructor(
    public readonly requiredBits: number,
    public readonly capacityBits: number,
    public readonly version: number,
    public readonly ecc: string
  ) {
    super(
      `Data too long for version ${version}-${ecc}: needs ${requiredBits} bits, capacity is ${capacityBits}`
    );
    this.name = "CapacityExceededError";
  }
}

// Bits ran out before every data module was filled.
export class LayoutOverflowError extends QrCodeError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(
      `Internal layout error: ${expected} data modules but only ${actual} bits supplied`
    );
    this.name = "LayoutOverflowError";
  }
}

// Every data module was filled and bits were left over.
export class LayoutUnderflowError extends QrCodeError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(
      `Internal layout error: ${expected} data modules but ${actual} bits supplied`
    );
    this.name = "LayoutUnderflowError";
  }
}

export class UnsupportedConfigurationError extends QrCodeError {
  constructor(message: string) {
    super(message);
    this.name = "UnsupportedConfigurationError";
  }
}

export class UnencodableCharacterError extends QrCodeError {
  constructor(public readonly character: string, public readonly index: number) {
    super(
      `Character ${JSON.stringify(character)} at index ${index} has no single-byte encoding`
    );
    this.name = "UnencodableCharacterError";
  }
}

export class InvalidColourError extends QrCodeError {
  constructor(public readonly spec: string) {
    super(`Invalid colour: ${spec}`);
    this.name = "InvalidColourError";
  }
}
