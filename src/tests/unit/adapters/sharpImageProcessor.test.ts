import sharp from 'sharp';
import { SharpImageProcessor } from '@/adapters/images/SharpImageProcessor';

function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 30, g: 90, b: 160 } },
  })
    .png()
    .toBuffer();
}

describe('SharpImageProcessor', () => {
  const processor = new SharpImageProcessor();

  it('should scale small images up to a 500 px wide thumbnail', async () => {
    const renditions = await processor.process(await solidPng(100, 50));

    const thumbnail = await sharp(renditions.thumbnail).metadata();
    expect(thumbnail.format).toBe('webp');
    expect(thumbnail.width).toBe(500);
    expect(thumbnail.height).toBe(250);
  });

  it('should never enlarge the optimized rendition', async () => {
    const renditions = await processor.process(await solidPng(100, 50));

    const optimized = await sharp(renditions.optimized).metadata();
    expect(optimized.width).toBe(100);
    expect(renditions).toMatchObject({
      width: 100,
      height: 50,
      contentType: 'image/webp',
      extension: '.webp',
    });
    expect(renditions.blurHash).toHaveLength(28);
  });
});
