export interface ImagePreparationOptions {
  maxBytes?: number;
}

export interface PreparedImage {
  data: Buffer;
  width: number;
  height: number;
  quality: number;
  byteLength: number;
  withinLimit: boolean;
}

export interface IImagePreparer {
  prepare(image: Buffer, options?: ImagePreparationOptions): Promise<PreparedImage>;
}
