export { RunJournal } from "./journal.js";
export type { IntegrityReport, JournalRecovery, RunJournalOptions, RunJournalListener } from "./journal.js";
export { PidLockfile } from "./lockfile.js";
export type { PidLockfileOptions } from "./lockfile.js";
