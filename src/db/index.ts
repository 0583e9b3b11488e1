export { RoundArchiveDatabase, getDatabase, closeDatabase } from './Database.js';
