export const LOOPBACK_BIND_ADDRESS = '127.0.0.1';
export const DEFAULT_REDIRECT_HOST = 'localhost';
export const DEFAULT_CALLBACK_PATH = '/callback';

const LOOPBACK_HOSTS = new Set([DEFAULT_REDIRECT_HOST, LOOPBACK_BIND_ADDRESS]);

// WHATWG URL drops a default port (http://localhost:80 has port ''), so read it from the authority
const EXPLICIT_PORT = /^[a-z][a-z\d+.-]*:\/\/[^/?#]*?:(\d+)(?=[/?#]|$)/i;

export interface LoopbackRedirect {
  host: string;
  port?: number;
  path: string;
}

/**
 * Take a caller-supplied loopback redirect URI apart.
 * Throws a plain Error describing the problem; callers wrap it.
 *
 * @example
 * parseLoopbackRedirect('http://localhost:8080/oauth') // → { host: 'localhost', port: 8080, path: '/oauth' }
 * parseLoopbackRedirect('http://127.0.0.1') // → { host: '127.0.0.1', path: '/callback' }
 * parseLoopbackRedirect('http://localhost:80/oauth/') // → { host: 'localhost', port: 80, path: '/oauth/' }
 */
export function parseLoopbackRedirect(input: string): LoopbackRedirect {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new Error(`Invalid redirect URI: ${input}`);
  }

  if (url.protocol !== 'http:') {
    throw new Error('Redirect URI must use the http scheme for desktop authentication');
  }
  if (!LOOPBACK_HOSTS.has(url.hostname)) {
    throw new Error('Redirect URI must use localhost or 127.0.0.1 for desktop authentication');
  }
  if (url.search || url.hash) {
    throw new Error('Redirect URI must not carry a query string or fragment');
  }

  // A bare origin has nowhere to receive the redirect; every other path is kept verbatim
  const path = url.pathname === '/' ? DEFAULT_CALLBACK_PATH : url.pathname;
  const redirect: LoopbackRedirect = { host: url.hostname, path };
  const port = url.port || EXPLICIT_PORT.exec(input.trim())?.[1];
  if (port) {
    redirect.port = Number(port);
  }
  return redirect;
}

export function formatLoopbackRedirect(host: string, port: number, path: string): string {
  return `http://${host}:${port}${path}`;
}
