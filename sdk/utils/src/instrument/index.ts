import {
  addHandler,
  maybeInstrument,
  resetInstrumentationHandlers,
  triggerHandlers,
} from './handlers';
import { addConsoleInstrumentationHandler } from './console';
import { addGlobalErrorInstrumentationHandler } from './globalError';
import { addGlobalUnhandledRejectionInstrumentationHandler } from './globalUnhandledRejection';

export type {
  InstrumentHandlerCallback,
  InstrumentHandlerType,
} from './handlers';

export {
  addConsoleInstrumentationHandler,
  addGlobalErrorInstrumentationHandler,
  addGlobalUnhandledRejectionInstrumentationHandler,
  addHandler,
  maybeInstrument,
  triggerHandlers,
  // Only exported for tests
  resetInstrumentationHandlers,
};
