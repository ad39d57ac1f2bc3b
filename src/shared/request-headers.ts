const DEFAULT_USER_AGENT = "Mozilla/5.0 (Macintosh; Intel Mac OS X 13_6_4) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";
const DEFAULT_ACCEPT_LANGUAGE = "en-US";

export type RequestHeaderOverrides = {
  userAgent?: string;
  acceptLanguage?: string;
};

const normalizeHeaderValue = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : fallback;
};

/** Browser-like headers sent with every platform request. Env overrides sit under explicit ones. */
export const buildRequestHeaders = (overrides: RequestHeaderOverrides = {}): Record<string, string> => {
  const userAgent = normalizeHeaderValue(
    overrides.userAgent,
    normalizeHeaderValue(process.env.TUBESCRIPT_USER_AGENT, DEFAULT_USER_AGENT)
  );
  const acceptLanguage = normalizeHeaderValue(
    overrides.acceptLanguage,
    normalizeHeaderValue(process.env.TUBESCRIPT_ACCEPT_LANGUAGE, DEFAULT_ACCEPT_LANGUAGE)
  );
  return {
    "user-agent": userAgent,
    "accept-language": acceptLanguage
  };
};
