export const SERVICE_NAME = 'backend';
