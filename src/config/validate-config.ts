import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import * as fs from 'fs';
import { normalizeScopes } from '../auth/authorization-url.ts';
import { DEFAULT_PROVIDER_ENDPOINTS, DEFAULT_REDIRECT_TIMEOUT_MS, OPENID_SCOPE } from '../auth/constants.ts';
import { ConfigurationError, describeCause } from '../auth/errors.ts';
import type { NormalizedSignInConfig, ProviderEndpoints, SignInConfig } from '../auth/types.ts';
import { DEFAULT_CALLBACK_PATH, DEFAULT_REDIRECT_HOST, type LoopbackRedirect, parseLoopbackRedirect } from '../lib/url-utils.ts';

/**
 * Validation result for a sign-in configuration
 */
export type SignInConfigValidation = { valid: true; config: NormalizedSignInConfig; warnings: string[] } | { valid: false; errors: string[] };

type SchemaName = 'sign-in-config' | 'provider-endpoints';

// Module-level cache for schemas and validators
const schemaCache = new Map<SchemaName, SchemaObject>();
let ajvInstance: Ajv | undefined;
let signInConfigValidator: ValidateFunction<SignInConfig> | undefined;
let endpointsValidator: ValidateFunction<ProviderEndpoints> | undefined;

/**
 * Get a bundled schema (loads once from the schemas/ directory at the package root, then caches)
 */
function getSchema(name: SchemaName): SchemaObject {
  const cached = schemaCache.get(name);
  if (cached) {
    return cached;
  }

  const schemaUrl = new URL(`../../schemas/${name}.schema.json`, import.meta.url);
  if (!fs.existsSync(schemaUrl)) {
    throw new Error(`Schema not found at: ${schemaUrl.pathname}`);
  }

  const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaUrl, 'utf8'));
  schemaCache.set(name, schema);
  return schema;
}

function getAjv(): Ajv {
  if (!ajvInstance) {
    ajvInstance = new Ajv({
      allErrors: true,
      verbose: true,
      strictSchema: false, // Allow annotation keywords such as "description"
    });
    // Add format validators (uri, etc.)
    addFormats(ajvInstance);
  }
  return ajvInstance;
}

function getSignInConfigValidator(): ValidateFunction<SignInConfig> {
  if (!signInConfigValidator) {
    signInConfigValidator = getAjv().compile<SignInConfig>(getSchema('sign-in-config'));
  }
  return signInConfigValidator;
}

function getEndpointsValidator(): ValidateFunction<ProviderEndpoints> {
  if (!endpointsValidator) {
    endpointsValidator = getAjv().compile<ProviderEndpoints>(getSchema('provider-endpoints'));
  }
  return endpointsValidator;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (
    errors?.map((e) => {
      const path = e.instancePath || '(root)';
      return `${path}: ${e.message}`;
    }) || []
  );
}

/**
 * Validate a sign-in configuration against JSON Schema and resolve defaults
 *
 * Missing client secret or scopes are reported here so the flow fails before
 * any socket is bound or request is sent.
 *
 * @param input - Caller-supplied configuration
 * @returns Normalized configuration with warnings, or the list of problems
 */
export function validateSignInConfig(input: unknown): SignInConfigValidation {
  const validate = getSignInConfigValidator();
  if (!validate(input)) {
    return { valid: false, errors: formatErrors(validate.errors) };
  }

  // Required by the schema; repeated here so the types narrow
  const { clientSecret, scopes } = input;
  if (!clientSecret || !scopes) {
    return { valid: false, errors: ['(root): clientSecret and scopes are required'] };
  }

  let redirect: LoopbackRedirect = { host: DEFAULT_REDIRECT_HOST, path: DEFAULT_CALLBACK_PATH };
  if (input.redirectUri) {
    try {
      redirect = parseLoopbackRedirect(input.redirectUri);
    } catch (err) {
      return { valid: false, errors: [`/redirectUri: ${describeCause(err)}`] };
    }
  }

  const warnings: string[] = [];
  const requestIdToken = input.requestIdToken ?? true;
  const normalizedScopes = normalizeScopes(scopes, requestIdToken);
  if (new Set(scopes).size !== scopes.length) {
    warnings.push('Duplicate scopes were removed');
  }
  if (requestIdToken && !scopes.includes(OPENID_SCOPE)) {
    warnings.push(`Scope "${OPENID_SCOPE}" was added to request an ID token`);
  }

  const config: NormalizedSignInConfig = {
    clientId: input.clientId,
    clientSecret,
    scopes: normalizedScopes,
    redirectHost: redirect.host,
    callbackPath: redirect.path,
    timeoutMs: input.timeoutMs ?? DEFAULT_REDIRECT_TIMEOUT_MS,
  };
  if (redirect.port !== undefined) {
    config.port = redirect.port;
  }
  if (input.hostedDomain) {
    config.hostedDomain = input.hostedDomain;
  }
  if (input.loginHint) {
    config.loginHint = input.loginHint;
  }
  if (input.successHtmlResponse !== undefined) {
    config.successHtmlResponse = input.successHtmlResponse;
  }

  return { valid: true, config, warnings };
}

/**
 * Validate and normalize, throwing ConfigurationError on failure
 */
export function assertSignInConfig(input: unknown): { config: NormalizedSignInConfig; warnings: string[] } {
  const result = validateSignInConfig(input);
  if (!result.valid) {
    throw new ConfigurationError('Invalid sign-in configuration', result.errors);
  }
  return { config: result.config, warnings: result.warnings };
}

/**
 * Merge endpoint overrides over the defaults and check every endpoint is an absolute URI
 */
export function resolveProviderEndpoints(overrides: Partial<ProviderEndpoints> = {}): ProviderEndpoints {
  const endpoints = { ...DEFAULT_PROVIDER_ENDPOINTS, ...overrides };
  const validate = getEndpointsValidator();
  if (!validate(endpoints)) {
    throw new ConfigurationError('Invalid provider endpoints', formatErrors(validate.errors));
  }
  return endpoints;
}
