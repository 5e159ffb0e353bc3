import pdfParse from 'pdf-parse';
import {
  DocumentParseError,
  DocumentTooLargeError,
  PdfParserService,
} from './pdf-parser.service';

jest.mock('pdf-parse', () => jest.fn());

const mockedParse = jest.mocked(pdfParse);

const parsed = (text: string, numpages: number) => ({
  numpages,
  numrender: numpages,
  info: {},
  metadata: null,
  version: 'v1.10.100' as const,
  text,
});

describe('PdfParserService', () => {
  const service = new PdfParserService({ maxUploadBytes: 64, minCharsPerPage: 10 });

  beforeEach(() => {
    mockedParse.mockReset();
  });

  it('rejects documents over the size limit before parsing', async () => {
    const buffer = Buffer.alloc(65);

    await expect(service.parsePdfBuffer(buffer, 'big.pdf')).rejects.toBeInstanceOf(DocumentTooLargeError);
    expect(mockedParse).not.toHaveBeenCalled();
  });

  it('cleans the extracted text and keeps line breaks', async () => {
    const bell = String.fromCharCode(7);
    mockedParse.mockResolvedValue(parsed(`Jane Doe  \r\nSKILLS${bell}\nPython\n\n`, 1));
    const buffer = Buffer.from('%PDF-1.4 test');

    await expect(service.parsePdfBuffer(buffer, 'resume.pdf')).resolves.toEqual({
      text: 'Jane Doe\nSKILLS\nPython',
      numPages: 1,
      fileName: 'resume.pdf',
      byteSize: buffer.length,
      readable: true,
    });
  });

  it('marks image-only documents as unreadable', async () => {
    mockedParse.mockResolvedValue(parsed('  \n ', 3));

    const document = await service.parsePdfBuffer(Buffer.from('%PDF-1.4 scan'), 'scan.pdf');

    expect(document.text).toBe('');
    expect(document.readable).toBe(false);
  });

  it('wraps parser failures', async () => {
    mockedParse.mockRejectedValue(new Error('bad XRef entry'));

    await expect(service.parsePdfBuffer(Buffer.from('junk'), 'resume.pdf')).rejects.toThrow(
      new DocumentParseError('resume.pdf', 'bad XRef entry'),
    );
  });

  it('measures readability per page', () => {
    expect(service.isReadable('abcdefghij', 0)).toBe(true);
    expect(service.isReadable('abcdefghij', 2)).toBe(false);
    expect(service.isReadable('abcde fghij klmno pqrst', 2)).toBe(true);
  });
});
