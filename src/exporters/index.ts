export {
  CSV_HEADERS,
  CsvExporter,
  type CsvExporterOptions,
  escapeCsvField,
  type Exporter,
  formatTimestamp,
  readExport,
  toCsv
} from './csv-exporter';
