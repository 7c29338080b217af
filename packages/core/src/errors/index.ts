const DISABLE_STACKTRACE : boolean = true;

export class NcmError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name  = new.target.name;
    if (DISABLE_STACKTRACE) this.stack = undefined;
  }
}

export class TruncatedInputError     extends NcmError {}
export class InvalidPaddingError     extends NcmError {}
export class InvalidKeyMaterialError extends NcmError {}
export class CipherFailureError      extends NcmError {}
export class Base64DecodeError       extends NcmError {}
export class JsonParseError          extends NcmError {}
export class MissingFormatFieldError extends NcmError {}
export class OutputWriteError        extends NcmError {}
export class InvalidHeaderError      extends NcmError {}
export class DecodingError           extends NcmError {}
export class FilesystemError         extends NcmError {}
export class ConfigError             extends NcmError {}
export class TagWriteError           extends NcmError {}
