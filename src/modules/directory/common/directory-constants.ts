export const DIRECTORY_RESOURCE_TYPE = 'directory';

/** Route segment under the global prefix; also the path used in links. */
export const DIRECTORY_RESOURCE_PATH = 'directory';

export const MISSING_QUERY_DETAIL = 'Missing query parameter.';
export const INTERNAL_ERROR_DETAIL = 'Internal server error.';

export const AUTH_REALM = 'directory';

/** Error `title` by HTTP status. */
export const ERROR_TITLES: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};
