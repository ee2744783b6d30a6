import { FieldBase } from "./field-base.js";

/** Image URL */
export class ImageField extends FieldBase {
  uiComponent(): string {
    return "ImageUpload";
  }
}

/** Video URL (YouTube, Vimeo, direct file) */
export class VideoField extends FieldBase {
  uiComponent(): string {
    return "VideoEmbed";
  }
}
