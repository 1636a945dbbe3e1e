import { ConfigService } from '@nestjs/config';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { GeneratorError } from '../../common/errors';
import { ImageGeneratorService } from './image-generator.service';

const mockGenerate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    images: { generate: mockGenerate },
  })),
}));

describe('ImageGeneratorService', () => {
  const { OPENAI_API_KEY, OPENAI_IMAGE_MODEL } = process.env;
  let dir: string;

  beforeEach(async () => {
    mockGenerate.mockReset();
    delete process.env.OPENAI_API_KEY;
    delete process.env.OPENAI_IMAGE_MODEL;
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-generator-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  afterAll(() => {
    if (OPENAI_API_KEY !== undefined) {
      process.env.OPENAI_API_KEY = OPENAI_API_KEY;
    }
    if (OPENAI_IMAGE_MODEL !== undefined) {
      process.env.OPENAI_IMAGE_MODEL = OPENAI_IMAGE_MODEL;
    }
  });

  it('writes the decoded image under the images directory', async () => {
    mockGenerate.mockResolvedValue({
      data: [{ b64_json: Buffer.from('png-bytes').toString('base64') }],
    });
    const service = new ImageGeneratorService(
      new ConfigService({ OPENAI_API_KEY: 'test-key' }),
    );
    const imagesDir = path.join(dir, 'images');

    const imagePath = await service.generate({
      description: 'A right triangle with legs 3 and 4',
      fileStem: 'diagram_q03',
      imagesDir,
    });

    expect(imagePath).toBe(path.join(imagesDir, 'diagram_q03.png'));
    await expect(fs.readFile(imagePath, 'utf8')).resolves.toBe('png-bytes');
    expect(mockGenerate).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'dall-e-3',
        n: 1,
        response_format: 'b64_json',
      }),
    );
  });

  it('fails when the response carries no image', async () => {
    mockGenerate.mockResolvedValue({ data: [] });
    const service = new ImageGeneratorService(
      new ConfigService({ OPENAI_API_KEY: 'test-key' }),
    );

    await expect(
      service.generate({
        description: 'A circle',
        fileStem: 'diagram_q01',
        imagesDir: dir,
      }),
    ).rejects.toThrow('Image response had no image data');
  });

  it('fails without an API key', async () => {
    const service = new ImageGeneratorService(new ConfigService({}));

    await expect(
      service.generate({
        description: 'A circle',
        fileStem: 'diagram_q01',
        imagesDir: dir,
      }),
    ).rejects.toBeInstanceOf(GeneratorError);
    expect(mockGenerate).not.toHaveBeenCalled();
  });
});
