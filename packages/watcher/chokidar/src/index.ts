export {
  DEFAULT_REPORT_FOLDER_WATCHER_OPTIONS,
  ReportFolderWatcher,
} from './report-folder-watcher.js';
export type { ReportFolderWatcherOptions } from './report-folder-watcher.js';
