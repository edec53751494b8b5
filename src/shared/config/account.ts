import { InvalidConfigError } from "../../core/errors/runtime.errors";

export type AccountChannel = "cloud" | "platform";

/**
 * Credentials and endpoint supplied by the caller. Held in memory only.
 */
export type AccountContext = {
  channel: AccountChannel;
  token: string;
  /** Preferred instance; resolution still checks it against the listing. */
  instance?: string;
  url: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch (err) {
    throw new InvalidConfigError({
      message: `${name} must be a valid absolute http/https URL. Received: ${value}`,
      context: { name },
      cause: err
    });
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new InvalidConfigError({
      message: `${name} must use http or https scheme. Received: ${value}`,
      context: { name }
    });
  }

  return value;
};

export const validateAccountContext = (account: AccountContext): AccountContext => {
  if (account.channel !== "cloud" && account.channel !== "platform") {
    throw new InvalidConfigError({
      message: `channel must be "cloud" or "platform". Received: ${String(account.channel)}`,
      context: { name: "channel" }
    });
  }
  if (account.token.trim() === "") {
    throw new InvalidConfigError({ message: "token must be a non-empty string", context: { name: "token" } });
  }
  if (account.instance != null && account.instance.trim() === "") {
    throw new InvalidConfigError({ message: "instance must not be blank when given", context: { name: "instance" } });
  }

  return { ...account, url: validateHttpUrl("url", account.url) };
};
