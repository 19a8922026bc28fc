/**
 * Guards materialization against requests aimed at the local machine or
 * internal networks (SSRF).
 */

export interface UrlValidationOptions {
  /**
   * Allow private/internal IP addresses (default: false)
   * WARNING: Enabling this can expose your application to SSRF attacks
   */
  allowPrivateIPs?: boolean;

  /**
   * Allow localhost addresses (default: false)
   * WARNING: Enabling this can expose your application to SSRF attacks
   */
  allowLocalhost?: boolean;

  /**
   * Custom list of allowed protocols (default: ['http:', 'https:'])
   */
  allowedProtocols?: string[];

  /**
   * Skip every check below.
   */
  disableValidation?: boolean;
}

export class SSRFError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SSRFError";
  }
}

type HostKind = "public" | "localhost" | "private" | "link-local";

// Unique local (fc00::/7) and link-local (fe80::/10) literals
const PRIVATE_IPV6 = [/^f[cd][0-9a-f]{2}:/i, /^fe[89ab][0-9a-f]:/i];

function classifyHost(hostname: string): HostKind {
  const host = hostname.toLowerCase().replace(/^\[|\]$/g, "");

  if (
    host === "localhost" ||
    host === "::1" ||
    host === "0.0.0.0" ||
    host.startsWith("127.")
  ) {
    return "localhost";
  }

  if (host.includes(":") && PRIVATE_IPV6.some((range) => range.test(host))) {
    return "private";
  }

  const octets = /^(\d+)\.(\d+)\.\d+\.\d+$/.exec(host);
  if (octets) {
    const a = Number(octets[1]);
    const b = Number(octets[2]);
    if (a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168)) {
      return "private";
    }
    if (a === 169 && b === 254) {
      return "link-local";
    }
  }

  return "public";
}

/**
 * Validates a URL before it is handed to a transport.
 *
 * @throws {SSRFError} If the URL is malformed, uses a disallowed protocol or
 * targets a host the options do not permit
 */
export function validateUrl(
  url: URL | string,
  options: UrlValidationOptions = {}
): void {
  const {
    allowPrivateIPs = false,
    allowLocalhost = false,
    allowedProtocols = ["http:", "https:"],
    disableValidation = false,
  } = options;

  if (disableValidation) {
    return;
  }

  let parsed: URL;
  if (url instanceof URL) {
    parsed = url;
  } else {
    if (!url) {
      throw new SSRFError("URL must be a non-empty string");
    }
    try {
      parsed = new URL(url);
    } catch {
      throw new SSRFError(`Invalid URL format: ${url}`);
    }
  }

  const protocol = parsed.protocol.toLowerCase();
  if (!allowedProtocols.includes(protocol)) {
    throw new SSRFError(
      `Protocol "${protocol}" is not allowed. Only ${allowedProtocols.join(", ")} are permitted.`
    );
  }

  switch (classifyHost(parsed.hostname)) {
    case "localhost":
      if (!allowLocalhost) {
        throw new SSRFError(
          "Localhost addresses are not allowed. Set allowLocalhost=true to override."
        );
      }
      return;
    case "private":
      if (!allowPrivateIPs) {
        throw new SSRFError(
          "Private/internal IP addresses are not allowed. Set allowPrivateIPs=true to override."
        );
      }
      return;
    case "link-local":
      if (!allowPrivateIPs) {
        throw new SSRFError("Link-local addresses (169.254.x.x) are not allowed.");
      }
      return;
    case "public":
      return;
  }
}
