import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fs from 'fs/promises';
import path from 'path';
import OpenAI from 'openai';
import { GeneratorError, toErrorMessage } from '../../common/errors';

export interface ImageRequest {
  description: string;
  /** File name without extension, e.g. `diagram_q03`. */
  fileStem: string;
  imagesDir: string;
}

@Injectable()
export class ImageGeneratorService {
  private readonly logger = new Logger(ImageGeneratorService.name);
  private readonly openai?: OpenAI;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    this.model =
      this.configService.get<string>('OPENAI_IMAGE_MODEL') ?? 'dall-e-3';

    if (apiKey) {
      this.openai = new OpenAI({ apiKey });
    }
  }

  /**
   * Generates a PNG for the description and returns its path under `imagesDir`.
   */
  async generate(request: ImageRequest): Promise<string> {
    if (!this.openai) {
      throw new GeneratorError(
        'Image generation is not configured (OPENAI_API_KEY)',
      );
    }

    const prompt =
      'A clean black-and-white textbook figure for a mathematics question, ' +
      `with clear labels and no decorative elements: ${request.description}`;

    let encoded: string | undefined;
    try {
      const response = await this.openai.images.generate({
        model: this.model,
        prompt,
        n: 1,
        size: '1024x1024',
        response_format: 'b64_json',
      });
      encoded = response.data?.[0]?.b64_json;
    } catch (error) {
      throw new GeneratorError(
        `Image request failed: ${toErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!encoded) {
      throw new GeneratorError('Image response had no image data');
    }

    await fs.mkdir(request.imagesDir, { recursive: true });
    const imagePath = path.join(request.imagesDir, `${request.fileStem}.png`);
    await fs.writeFile(imagePath, Buffer.from(encoded, 'base64'));

    this.logger.log(`Wrote image ${imagePath}`);
    return imagePath;
  }
}
