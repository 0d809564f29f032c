export { requestJson, type ExternalRequest } from './external-request';
export { fetchWithTimeout, parseJson } from './http-client';
