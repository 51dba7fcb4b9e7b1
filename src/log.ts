import createDebug from 'debug';

import { LOG_NAMESPACE_STORAGE, LOG_NAMESPACE_VECTOR } from './constants';

// Silent unless enabled, e.g. DEBUG=static-vector:* in Node.js or
// localStorage.debug = 'static-vector:*' in a browser.
export const vectorLog  = createDebug(LOG_NAMESPACE_VECTOR);
export const storageLog = createDebug(LOG_NAMESPACE_STORAGE);
