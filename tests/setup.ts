import { setLoggerSilent } from '../src/utils/logger';

setLoggerSilent(true);
