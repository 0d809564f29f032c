export { filterAvailable, limitPayloadSize, limitSize, payloadSizeKb } from './stock-limits';
