export {
  DocumentConversionError,
  EngineUnavailableError,
  ProcessingError,
  ProgrammerError,
  UnknownFormatError,
  UnsupportedFormatError,
} from './conversion-error';
