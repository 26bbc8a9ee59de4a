export { Journal, type JournalOptions, type JournalListener } from "./journal.js";
