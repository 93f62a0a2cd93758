export interface Photo {
  album: string;
  filename: string;
  key: string;
}

export interface UploadAlbumResult {
  album: string;
  /** Keys written, in upload order. */
  keys: string[];
}

export type DeleteAlbumResult =
  | { status: "deleted"; album: string; deleted: number }
  | { status: "not_found"; album: string };
