import { readCsv, readJsonRows } from '../../engine/readRows';

describe('readJsonRows', () => {
  it('trims keys, nulls non-scalars and skips blank rows', () => {
    const result = readJsonRows([
      { ' Name ': 'Alice', 'QS%': 92, nested: { a: 1 } },
      {},
      'not a row',
      { Name: '   ' }
    ]);
    if (!result.ok) throw new Error(result.message);

    expect(result.table.columns).toEqual(['Name', 'QS%', 'nested']);
    expect(result.table.rows).toEqual([{ Name: 'Alice', 'QS%': 92, nested: null }]);
    expect(result.table.sheet_name).toBeNull();
  });

  it('reports EMPTY_DATA when nothing is left', () => {
    expect(readJsonRows([{}])).toMatchObject({ ok: false, error_code: 'E703' });
  });
});

describe('readCsv', () => {
  it('reads a header row and trimmed cells', () => {
    const result = readCsv('Name, QS% \nAlice , 92\n\nBob,\n');
    if (!result.ok) throw new Error(result.message);

    expect(result.table.columns).toEqual(['Name', 'QS%']);
    expect(result.table.rows).toEqual([
      { Name: 'Alice', 'QS%': '92' },
      { Name: 'Bob', 'QS%': null }
    ]);
  });

  it('reports EMPTY_DATA for empty text or a header without rows', () => {
    expect(readCsv('')).toMatchObject({ ok: false, error_code: 'E703' });
    expect(readCsv('Name,QS%\n')).toMatchObject({ ok: false, error_code: 'E703' });
  });

  it('reports FILE_UNREADABLE for malformed CSV', () => {
    expect(readCsv('Name\n"Alice')).toMatchObject({ ok: false, error_code: 'E701' });
  });
});
