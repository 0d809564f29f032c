export { MessagingHttpAdapter, MissingMessagingTokenError } from './messaging-http.adapter';
