// __tests__/helpers/workbook.ts
import ExcelJS from 'exceljs';

export function copyToArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}

/** Build a workbook in memory and return its .xlsx bytes. */
export async function workbookBytes(build: (workbook: ExcelJS.Workbook) => void): Promise<ArrayBuffer> {
  const workbook = new ExcelJS.Workbook();
  build(workbook);
  const written = await workbook.xlsx.writeBuffer();
  return copyToArrayBuffer(new Uint8Array(written));
}

export async function loadWorkbook(data: ArrayBuffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(data);
  return workbook;
}
