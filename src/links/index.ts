/**
 * NewsScout — Links Module
 */

export {
  resolveArticleUrl,
  resolveReportLinks,
  reportLinks,
  DEFAULT_LINK_TIMEOUT_MS,
  type LinkResolver,
} from './resolver';

export {
  GoogleNewsLinkResolver,
  googleNewsArticleId,
  decodingParams,
  buildDecodeRequestBody,
  parseDecodeResponse,
  type DecodingParams,
} from './google-news';
