// Office document to PDF conversion via LibreOffice

export {
  SofficeConverter,
  type DocumentConverter,
  type ConversionOptions,
  type SofficeConverterOptions,
} from './soffice.js';
