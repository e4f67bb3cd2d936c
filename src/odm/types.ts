export interface Part {
  readonly number: number;
  readonly name: string;
  readonly fileName: string;
  /** Expected size in bytes, when the manifest declares one. */
  readonly fileSize?: number | undefined;
  /** Duration as written in the manifest, e.g. "1:02:03". */
  readonly duration: string;
  readonly durationSeconds?: number | undefined;
  readonly downloadUrl: string;
}

export interface Manifest {
  readonly mediaId: string;
  readonly title: string;
  readonly subtitle?: string | undefined;
  readonly authors: readonly string[];
  /** Authors joined with ";". */
  readonly author: string;
  readonly publisher?: string | undefined;
  readonly series?: string | undefined;
  readonly language?: string | undefined;
  readonly description?: string | undefined;
  readonly coverUrl?: string | undefined;
  readonly licenseAcquisitionUrl: string;
  readonly baseUrl: string;
  readonly parts: readonly Part[];
}

export interface License {
  /** License document as returned by the license server. */
  readonly xml: string;
  readonly clientId: string;
}

export interface DownloadTarget {
  readonly part: Part;
  readonly filePath: string;
}

export interface BookLayout {
  readonly authorDir: string;
  readonly bookDir: string;
  readonly coverPath: string;
  readonly targets: readonly DownloadTarget[];
}
