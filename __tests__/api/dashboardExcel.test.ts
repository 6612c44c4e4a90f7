import handler from '../../api/dashboardExcel';
import { clearSnapshot } from '../../engine/snapshotStore';
import { mockRequest, mockResponse, silenceLogs } from '../helpers/http';
import { workbookBytes } from '../helpers/workbook';

const mockFileContent = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: function OpenAI() {
    return { files: { content: mockFileContent } };
  }
}));

const ORIGINAL_KEY = process.env.OPENAI_API_KEY;

beforeEach(() => {
  clearSnapshot();
  mockFileContent.mockReset();
  silenceLogs();
  process.env.OPENAI_API_KEY = 'test-key';
});

afterAll(() => {
  if (ORIGINAL_KEY === undefined) delete process.env.OPENAI_API_KEY;
  else process.env.OPENAI_API_KEY = ORIGINAL_KEY;
});

describe('POST /api/dashboardExcel', () => {
  it('downloads the workbook by file id and builds the dashboard', async () => {
    const data = await workbookBytes((workbook) => {
      const sheet = workbook.addWorksheet('Sheet1');
      sheet.addRow(['Name', 'Date Completed', 'Actual Work Hours']);
      sheet.addRow(['Alice', '20250703', 6]);
    });
    mockFileContent.mockResolvedValue({ arrayBuffer: async () => data });

    const { res, captured } = mockResponse();
    await handler(mockRequest('POST', { file_id: 'file-test' }), res);

    expect(mockFileContent).toHaveBeenCalledWith('file-test');
    expect(captured.statusCode).toBe(200);
    expect(captured.body).toMatchObject({
      status: 'OK',
      sheet_name: 'Sheet1',
      team_month: [{ month_bucket: '2025-07-01', actual_hours: 6 }]
    });
  });

  it('answers 422 for a file that is not a workbook', async () => {
    mockFileContent.mockResolvedValue({ arrayBuffer: async () => new ArrayBuffer(8) });

    const { res, captured } = mockResponse();
    await handler(mockRequest('POST', { file_id: 'file-test' }), res);

    expect(captured.statusCode).toBe(422);
    expect(captured.body).toMatchObject({ error_codes: ['E701'] });
  });

  it('answers 500 / E607 when the download fails', async () => {
    mockFileContent.mockRejectedValue(new Error('network down'));

    const { res, captured } = mockResponse();
    await handler(mockRequest('POST', { file_id: 'file-test' }), res);

    expect(captured.statusCode).toBe(500);
    expect(captured.body).toMatchObject({ error_codes: ['E607'] });
  });

  it('answers 500 without an API key', async () => {
    delete process.env.OPENAI_API_KEY;

    const { res, captured } = mockResponse();
    await handler(mockRequest('POST', { file_id: 'file-test' }), res);

    expect(captured.statusCode).toBe(500);
    expect(mockFileContent).not.toHaveBeenCalled();
  });
});
