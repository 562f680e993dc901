export const PROGRAM_NAME = 'wallspan';

export const DEFAULT_SPLINE_ORDER = 3;

// Formats sharp can decode. Lower- and upper-case spellings are accepted, mixed case is not.
export const IMAGE_FILE_SUFFIXES = [
  '.avif',
  '.gif',
  '.heic',
  '.heif',
  '.jpe',
  '.jpeg',
  '.jpg',
  '.png',
  '.svg',
  '.tif',
  '.tiff',
  '.webp',
];

// Formats sharp can encode from an output filename.
export const OUTPUT_FILE_SUFFIXES = ['.avif', '.gif', '.jpeg', '.jpg', '.png', '.tif', '.tiff', '.webp'];

export const GNOME_BACKGROUND_SCHEMA = 'org.gnome.desktop.background';
export const GNOME_BACKGROUND_PLUGIN_SCHEMA = 'org.gnome.settings-daemon.plugins.background';
