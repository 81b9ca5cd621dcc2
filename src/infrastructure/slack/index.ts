export { SlackWebApiClient, SlackHttpError, DEFAULT_SLACK_API_BASE_URL } from './web-api-client.js';
export type {
  SlackConnectionsApi,
  SlackMessagingApi,
  SlackWebApiClientOptions,
  OpenConnectionResponse,
  PermalinkResponse,
  PermalinkRequest,
  PostMessageResponse,
  PostMessageRequest,
} from './web-api-client.js';
