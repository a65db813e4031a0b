import sharp from 'sharp';
import { SharpImageProcessor } from '../sharp';

function blankFrame(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: '#ffffff' } }).png().toBuffer();
}

describe('SharpImageProcessor', () => {
  test('should split a frame at the title fraction', async () => {
    const processor = new SharpImageProcessor();

    const { title, price } = await processor.splitRegions(await blankFrame(10, 20), 0.65);

    expect(await sharp(title).metadata()).toMatchObject({ width: 10, height: 13, format: 'png' });
    expect(await sharp(price).metadata()).toMatchObject({ width: 10, height: 7 });
  });

  test('should refuse frames above the size limit', async () => {
    const processor = new SharpImageProcessor({ maxDimension: 5 });

    await expect(processor.splitRegions(await blankFrame(10, 20), 0.5)).rejects.toThrow(
      'Frame too large: 10x20 exceeds 5px limit'
    );
  });

  test('should upscale short regions for OCR', async () => {
    const processor = new SharpImageProcessor({ minOcrHeight: 64 });

    const prepared = await processor.prepareForOcr(await blankFrame(10, 20));

    expect(await sharp(prepared).metadata()).toMatchObject({ width: 32, height: 64, format: 'png' });
  });

  test('should return undecodable input unchanged', async () => {
    const garbage = Buffer.from('not an image');
    await expect(new SharpImageProcessor().prepareForOcr(garbage)).resolves.toBe(garbage);
  });
});
