export { CommerceHttpAdapter } from './commerce-http.adapter';
