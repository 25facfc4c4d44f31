export interface FetchedResource {
  /**
   * The URL the response came from
   */
  url: URL;
  status: number;
  /**
   * Value of the Content-Type header, or a guess based on the file extension
   * for file:// URLs
   */
  contentType: string;
  body: Uint8Array;
}

/**
 * Raised by `fetchResource` when there is no response at all (DNS failure,
 * refused connection, missing file). An HTTP error status is not a FetchError.
 */
export class FetchError extends Error {
  url: URL;

  constructor(url: URL, message: string, options?: {cause?: unknown}) {
    super(`${url.href}: ${message}`, options);
    this.name = 'FetchError';
    this.url = url;
  }
}

export interface Environment {
  /**
   * Must return a promise of the resource at the URL. Redirects are not
   * followed; whatever status the server answers with is returned as-is.
   */
  fetchResource(url: URL): Promise<FetchedResource>;
  /**
   * Called for every recoverable problem: markup that had to be repaired, CSS
   * that was skipped, computed values that were unusable during layout, and
   * stylesheets that failed to load.
   */
  warn(message: string): void;
  /**
   * When true, navigations stop being accepted after the first layout is
   * published. Used to time a single page load.
   */
  haltAfterFirstLayout: boolean;
}

export const defaultEnvironment: Environment = {
  fetchResource() {
    throw new Error(
      'Fetching not configured. Import "pagewright/environment-node.js" or ' +
        'assign an async function to environment.fetchResource.'
    );
  },
  warn(message) {
    console.warn(message);
  },
  haltAfterFirstLayout: false
};

export const environment = {...defaultEnvironment};
