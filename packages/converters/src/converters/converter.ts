import type {
  ConversionOptions,
  ConversionResult,
  ConverterId,
  DocumentFormat,
  SourceDocument,
  VariantKind,
} from '@docmill/model';

/**
 * A document-to-markdown converter variant.
 *
 * `convert` never throws for ordinary failures: they come back as a
 * result with `success: false`. Only ProgrammerError is thrown.
 */
export interface Converter {
  readonly id: ConverterId;
  readonly variant: VariantKind;

  supports(format: DocumentFormat): boolean;

  convert(
    document: SourceDocument,
    outputDirectory: string,
    options: ConversionOptions,
    signal?: AbortSignal,
  ): Promise<ConversionResult>;
}
