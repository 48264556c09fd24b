export { truncate, heading, yesNo } from './text';

export {
  sanitizeFileName,
  fileNameFromUrl,
  directoryExists,
  ensureDirectory,
  fileBrowserCommand,
  openInFileBrowser,
} from './files';
