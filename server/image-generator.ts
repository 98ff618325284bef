import OpenAI, { toFile } from "openai";
import { ExternalServiceError, classifyFailure } from "./error-handling";
import { trackApiCall } from "./monitoring";

/**
 * Image-to-image generation: the source photo plus an instruction in,
 * PNG bytes out.
 */
export interface ImageGenerator {
  generate(sourceJpeg: Buffer, prompt: string, signal?: AbortSignal): Promise<Buffer>;
}

export interface OpenAiImageGeneratorOptions {
  model: string;
  timeoutMs: number;
}

export class OpenAiImageGenerator implements ImageGenerator {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAiImageGeneratorOptions,
  ) {}

  async generate(sourceJpeg: Buffer, prompt: string, signal?: AbortSignal): Promise<Buffer> {
    return trackApiCall('image_generation', async () => {
      let b64: string | undefined;
      try {
        const image = await toFile(sourceJpeg, 'dog.jpg', { type: 'image/jpeg' });
        const response = await this.client.images.edit({
          model: this.options.model,
          image,
          prompt,
          n: 1,
          size: '1024x1024',
        }, { timeout: this.options.timeoutMs, signal });
        b64 = response.data?.[0]?.b64_json;
      } catch (error) {
        throw new ExternalServiceError('image_generation', classifyFailure(error), error instanceof Error ? error : undefined);
      }

      if (!b64) {
        throw new ExternalServiceError('image_generation', 'unavailable', new Error('Image generation returned no image data'));
      }
      return Buffer.from(b64, 'base64');
    });
  }
}
