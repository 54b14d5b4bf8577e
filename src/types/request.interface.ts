export interface ProfileCredentials {
  profileId: string;
  secretToken: string;
}

export const PROFILE_ID_HEADER = 'x-profile-id';
export const SECRET_TOKEN_HEADER = 'x-secret-token';
export const SERVICE_TOKEN_HEADER = 'x-service-token';
export const TELEGRAM_SECRET_HEADER = 'x-telegram-bot-api-secret-token';
