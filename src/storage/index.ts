export { Storage } from './Storage.js';
