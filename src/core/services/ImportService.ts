import fs from 'fs-extra';
import * as path from 'path';
import { BaseService } from './BaseService';
import { BulkImportOptions } from './ProjectService';
import { LookupImportResult } from './LookupService';
import { CoreAPI } from '../api/CoreAPI';
import { LookupCategory } from '../models/LookupValue';
import { ProjectImportResult, ProjectImportRow } from '../models/Project';
import { IOFailureError, ValidationError } from '../errors/CoreErrors';
import { readProjectRowsFromCsv, readProjectRowsFromWorkbook } from '../importers/projectReaders';
import { readLookupNamesFromCsv, readLookupNamesFromJson } from '../importers/lookupReaders';

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xls', '.ods']);

/**
 * Import Service
 * Reads spreadsheet files and feeds the repositories' bulk operations
 */
export class ImportService extends BaseService {
    constructor(core: CoreAPI) {
        super(core, 'ImportService');
    }

    /**
     * Parse a CSV or workbook file into project rows
     */
    async readProjectRows(filePath: string): Promise<ProjectImportRow[]> {
        const extension = path.extname(filePath).toLowerCase();

        if (extension === '.csv') {
            await this.assertReadable(filePath);
            return readProjectRowsFromCsv(filePath);
        }
        if (WORKBOOK_EXTENSIONS.has(extension)) {
            await this.assertReadable(filePath);
            return readProjectRowsFromWorkbook(await fs.readFile(filePath));
        }
        throw new ValidationError(`Unsupported import file type "${extension || path.basename(filePath)}"`, [
            { path: 'filePath', message: 'expected .csv, .xlsx, .xls or .ods' },
        ]);
    }

    /**
     * Import projects from a file through ProjectService.bulkImport
     */
    async importProjectsFromFile(filePath: string, options: BulkImportOptions = {}): Promise<ProjectImportResult> {
        const rows = await this.readProjectRows(filePath);
        this.logger.info(`Read ${rows.length} project row(s) from ${filePath}`);
        return this.core.services.projects.bulkImport(rows, options);
    }

    /**
     * Add lookup values listed in a JSON or CSV file
     */
    async importLookupValuesFromFile(category: LookupCategory, filePath: string): Promise<LookupImportResult> {
        const extension = path.extname(filePath).toLowerCase();
        await this.assertReadable(filePath);

        let names: string[];
        if (extension === '.json') {
            const text = await fs.readFile(filePath, 'utf8');
            try {
                names = readLookupNamesFromJson(text);
            } catch (error) {
                throw new ValidationError(`Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
            }
        } else if (extension === '.csv') {
            names = await readLookupNamesFromCsv(filePath);
        } else {
            throw new ValidationError(`Unsupported import file type "${extension || path.basename(filePath)}"`, [
                { path: 'filePath', message: 'expected .json or .csv' },
            ]);
        }

        return this.core.services.lookups.importValues(category, names);
    }

    private async assertReadable(filePath: string): Promise<void> {
        try {
            await fs.access(filePath, fs.constants.R_OK);
        } catch (error) {
            throw new IOFailureError(filePath, 'read', error);
        }
    }
}
