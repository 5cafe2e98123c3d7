import {
  newPageUrl,
  pageLinksFor,
  removeQuery,
  requestBase,
  requestUrl,
  setPageQuery,
} from '../page-url.js';
import { AppError } from '../errors.js';

describe('requestUrl', () => {
  it('builds an absolute URL from protocol, host and original url', () => {
    const url = requestUrl({ protocol: 'https', host: 'api.test:8443', url: '/api/places?city=KYIV' });
    expect(url.toString()).toBe('https://api.test:8443/api/places?city=KYIV');
  });

  it('drops the default port', () => {
    const url = requestUrl({ protocol: 'http', host: 'localhost:80', url: '/api/places' });
    expect(url.toString()).toBe('http://localhost/api/places');
  });

  it('rejects a host that cannot form a URL with a 400', () => {
    let caught: unknown;
    try {
      requestUrl({ protocol: 'http', host: 'bad host', url: '/' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({ statusCode: 400, code: 'INVALID_REQUEST_URL' });
  });
});

describe('requestBase', () => {
  it('strips the query string and fragment', () => {
    expect(requestBase(new URL('http://api.test/api/places?page=2&city=KYIV#top'))).toBe('http://api.test/api/places');
  });
});

describe('setPageQuery', () => {
  it('overwrites page and per_page and keeps other parameters in order', () => {
    const query = setPageQuery(new URL('http://api.test/x?city=KYIV&page=9&sort=name'), 2, 20);
    expect(query.toString()).toBe('city=KYIV&page=2&sort=name&per_page=20');
  });

  it('collapses repeated pagination parameters', () => {
    const query = setPageQuery(new URL('http://api.test/x?page=1&page=5&per_page=3'), 4, 10);
    expect(query.toString()).toBe('page=4&per_page=10');
  });
});

describe('newPageUrl', () => {
  it('appends pagination to a URL without query', () => {
    expect(newPageUrl(new URL('http://api.test/api/places'), 3, 10)).toBe('http://api.test/api/places?page=3&per_page=10');
  });

  it('does not modify the source URL', () => {
    const url = new URL('http://api.test/api/places?city=LVIV');
    newPageUrl(url, 3, 10);
    expect(url.toString()).toBe('http://api.test/api/places?city=LVIV');
  });
});

describe('removeQuery', () => {
  it('removes the pagination parameters by default', () => {
    expect(removeQuery(new URL('http://api.test/x?page=2&city=KYIV&per_page=5'))).toBe('http://api.test/x?city=KYIV');
  });

  it('leaves no dangling question mark', () => {
    expect(removeQuery(new URL('http://api.test/x?page=2&per_page=5'))).toBe('http://api.test/x');
  });

  it('removes the named parameters only', () => {
    expect(removeQuery(new URL('http://api.test/x?page=2&city=KYIV'), ['city'])).toBe('http://api.test/x?page=2');
  });
});

describe('pageLinksFor', () => {
  it('exposes the bare path and page links', () => {
    const links = pageLinksFor('http://api.test/api/places?city=KYIV&page=2&per_page=5');
    expect(links.path).toBe('http://api.test/api/places');
    expect(links.page(1, 5)).toBe('http://api.test/api/places?city=KYIV&page=1&per_page=5');
  });
});
