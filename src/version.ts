export const SERVER_NAME = 'web-tool-runtime';
export const SERVER_VERSION = '0.1.0';
