export { urlFor, DEFAULT_WEB_URL, type WebTarget } from './views.js';
export { openInBrowser, openerCommand, type OpenerCommand, type UrlOpener } from './browser.js';
