export { TelegramClient } from './client.js';
