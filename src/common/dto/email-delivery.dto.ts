export type EmailDeliveryDto = {
  success: true;
  message: string;
  service_used: string;
  to: string;
};

export type ApiErrorDto = {
  success: false;
  error: string;
  to: string | null;
  /** Machine-readable failure code (e.g. `smtp_auth_failed`, `validation`). */
  reason?: string;
  requestId?: string;
};
