export const APP_NAME = 'branch-guard';
export const APP_VERSION = '0.1.0';

// GitHub asks integrations to send a recognizable User-Agent.
export const USER_AGENT = `${APP_NAME}/${APP_VERSION}`;

export const GITHUB_COM_API_URL = 'https://api.github.com/';

export const WEBHOOK_ROUTE = '/webhooks/github';
