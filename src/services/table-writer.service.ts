import { Injectable } from '@nestjs/common';
import * as XLSX from 'xlsx';

@Injectable()
export class TableWriterService {
  /** Comma-separated text, header first. Cells are written as text. */
  toCsv(headers: string[], rows: string[][]): string {
    const sheet = XLSX.utils.aoa_to_sheet([headers, ...rows]);
    return XLSX.utils.sheet_to_csv(sheet, { FS: ',', RS: '\n', blankrows: true });
  }
}
