import { Agent, ProxyAgent, type Dispatcher } from "undici";

/**
 * Optional forward proxy for every catalog and package request
 */
export interface ProxySettings {
  address: string;
  login?: string;
  password?: string;
  /** Windows domain of the login, sent as DOMAIN\login */
  domain?: string;
}

export const USER_AGENT = "helpmirror/0.1";

/**
 * Proxy-Authorization value for the login, if any
 */
export function basicToken(proxy: ProxySettings): string | undefined {
  if (!proxy.login) {
    return undefined;
  }
  const user = proxy.domain ? `${proxy.domain}\\${proxy.login}` : proxy.login;
  const credentials = Buffer.from(`${user}:${proxy.password ?? ""}`).toString("base64");
  return `Basic ${credentials}`;
}

/**
 * Builds the undici dispatcher all requests of one session go through.
 * Callers own the result and close it when the session ends.
 */
export function createDispatcher(proxy?: ProxySettings): Dispatcher {
  if (!proxy) {
    return new Agent();
  }

  const token = basicToken(proxy);
  return new ProxyAgent({
    uri: proxy.address,
    ...(token ? { token } : {}),
  });
}
