import { clearDocumentCache } from '../src/loader/parser';
import { setLogLevel } from '../src/utils/logger';

setLogLevel('silent');

beforeEach(() => {
  clearDocumentCache();
});
