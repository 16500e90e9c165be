export { formatMarketWrap, composeFallbackMessage } from './message.js';
