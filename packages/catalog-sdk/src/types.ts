export type LocaleCode = string;

/**
 * Caching state of a package relative to the local cache directory.
 * Assigned by the reconciler and updated by the sync engine after a download.
 */
export const PackageState = {
  NotDownloaded: "not-downloaded",
  OutOfDate: "out-of-date",
  Ready: "ready",
} as const;

export type PackageState = (typeof PackageState)[keyof typeof PackageState];

export interface Locale {
  readonly code: LocaleCode;
  readonly name?: string;
  /** Link to the book catalog of this locale, relative to the services base URL */
  readonly catalogLink: string;
}

export interface Package {
  /** Case-insensitive identity of the package */
  name: string;
  deployed: string;
  lastModified: Date;
  etag: string;
  link: string;
  size: number;
  uncompressedSize: number;
  constituentLink?: string;
  state: PackageState;
}

export interface Book {
  code: string;
  locale: LocaleCode;
  name: string;
  description: string;
  /** Display grouping label */
  category: string;
  brandingPackageName: string;
  /** Selection flag; only wanted books are fetched by a sync */
  wanted: boolean;
  packages: Package[];
}

export interface BookGroup {
  code: string;
  locale: LocaleCode;
  name: string;
  description: string;
  vendor: string;
  books: Book[];
}

export interface Product {
  /** Version token used in the catalog path, e.g. "dev15" */
  token: string;
  name: string;
}
