/**
 * Unit Tests for FileOperationsLogger
 */

import { FileOperationsLogger, noopFileOperationsLog } from '../../utils/fileOperationsLogger';

describe('FileOperationsLogger', () => {
  function createLog() {
    const sink = { info: jest.fn(), error: jest.fn() };
    return { sink, log: new FileOperationsLogger(sink) };
  }

  it('formats resize lines with an optional enquiry', () => {
    const { sink, log } = createLog();

    log.logResize('enquiry_photos/2024/06/15/a.jpg', '3000x2000', '2048x1365');
    log.logResize('enquiry_photos/2024/06/15/a.jpg', '3000x2000', '2048x1365', 'MEM-24-0001');

    expect(sink.info.mock.calls).toEqual([
      ['RESIZE | enquiry_photos/2024/06/15/a.jpg | 3000x2000 → 2048x1365'],
      ['RESIZE | enquiry_photos/2024/06/15/a.jpg | 3000x2000 → 2048x1365 | Enquiry: MEM-24-0001'],
    ]);
  });

  it('writes errors to the error level', () => {
    const { sink, log } = createLog();

    log.logError('EXTRACT', 'photo.jpg', 'disk full');

    expect(sink.error).toHaveBeenCalledWith('ERROR | EXTRACT | photo.jpg | disk full');
    expect(sink.info).not.toHaveBeenCalled();
  });

  it('provides a log that discards everything', () => {
    expect(() => noopFileOperationsLog.logError('PARSE', 'a.msg', 'bad')).not.toThrow();
  });
});
