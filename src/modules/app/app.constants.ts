export const SERVICE_NAME = 'email-service';
