import {environment, defaultEnvironment, FetchError} from './environment.js';
import fs from 'node:fs';
import path from 'node:path';

const extensionTypes: Record<string, string> = {
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.txt': 'text/plain'
};

if (environment.fetchResource === defaultEnvironment.fetchResource) {
  environment.fetchResource = async function (url) {
    if (url.protocol === 'file:') {
      let body;

      try {
        body = await fs.promises.readFile(url);
      } catch (e) {
        throw new FetchError(url, 'could not read file', {cause: e});
      }

      const ext = path.extname(url.pathname).toLowerCase();
      const contentType = extensionTypes[ext] ?? 'application/octet-stream';
      return {url, status: 200, contentType, body: new Uint8Array(body)};
    } else {
      let res;

      try {
        res = await fetch(url, {redirect: 'manual'});
      } catch (e) {
        throw new FetchError(url, 'network error', {cause: e});
      }

      const body = new Uint8Array(await res.arrayBuffer());
      const contentType = res.headers.get('content-type') ?? 'text/html';
      return {url, status: res.status, contentType, body};
    }
  };
}

const timingMode = process.env.PAGEWRIGHT_TIMING_MODE;

if (timingMode !== undefined && timingMode !== '' && timingMode !== '0') {
  environment.haltAfterFirstLayout = true;
}
