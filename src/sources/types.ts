export interface PhotoFile {
  path: string;
  filename: string;
  extension: string;
  size: number;
}

export interface PhotoSource {
  name: string;
  scan(): AsyncGenerator<PhotoFile>;
}
