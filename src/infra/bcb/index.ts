export { makeJsonGetter, type FetchFn, type HttpOptions } from './http.js';
export {
  createODataClient,
  buildODataUrl,
  odataString,
  type ODataClient,
  type ODataClientOptions,
  type ODataQuery,
} from './odata-client.js';
export {
  createSgsClient,
  formatSgsDate,
  parseSgsDate,
  type DateRange,
  type SgsClient,
  type SgsClientOptions,
} from './sgs-client.js';
