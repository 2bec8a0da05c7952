import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Placeholder the destination identifier is substituted into. */
export const ENDPOINT_PLACEHOLDER = '%s';

/**
 * Checks that an endpoint template carries exactly one {@link ENDPOINT_PLACEHOLDER}.
 */
export function checkEndpointTemplate(template: string): SafeWrap<ConstructURLError, string> {
  const placeholders = template.split(ENDPOINT_PLACEHOLDER).length - 1;
  if (placeholders !== 1) {
    return [
      new ConstructURLError(
        `error endpoint template must contain exactly one ${ENDPOINT_PLACEHOLDER} placeholder, found ${placeholders}`,
        template,
      ),
      null,
    ];
  }

  return [null, template];
}

/**
 * Resolves an endpoint template into an absolute URL by substituting the destination identifier.
 * The identifier is URI-component encoded.
 *
 * @example
 * formatEndpoint('https://api.example.com/sites/%s/update', 'abc');
 * // [null, 'https://api.example.com/sites/abc/update']
 */
export function formatEndpoint(template: string, destinationId: string): SafeWrap<ConstructURLError, string> {
  const [errTemplate] = checkEndpointTemplate(template);
  if (errTemplate) {
    return [errTemplate, null];
  }

  if (!destinationId) {
    return [new ConstructURLError('error constructing URL, destination id is empty', template), null];
  }

  const url = template.replace(ENDPOINT_PLACEHOLDER, () => encodeURIComponent(destinationId));
  const [errUrl] = safeWrap(() => new URL(url));
  if (errUrl) {
    return [new ConstructURLError(`error constructing URL, ${url} is not absolute`, url, { cause: errUrl }), null];
  }

  return [null, url];
}
