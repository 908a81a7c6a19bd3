import { ExportAdapter, ExportFormat } from './ExportAdapter';
import { CsvExporter } from './CsvExporter';
import { XlsxExporter } from './XlsxExporter';
import { JsonExporter } from './JsonExporter';

export { ExportAdapter, ExportFormat, EXPORT_FORMATS } from './ExportAdapter';
export { CsvExporter } from './CsvExporter';
export { XlsxExporter, XLSX_SHEETS } from './XlsxExporter';
export { JsonExporter, EXPORT_SCHEMA_VERSION } from './JsonExporter';
export { ENTRY_COLUMNS } from './tables';

export function createExportAdapters(): Record<ExportFormat, ExportAdapter> {
    return {
        csv: new CsvExporter(),
        xlsx: new XlsxExporter(),
        json: new JsonExporter(),
    };
}
