import { MediaService, sanitizeFileName, uploadErrors } from '@/services/media.service';
import {
  createMockImageRepository,
  createMockObjectStorage,
  createMockJobQueue,
} from '@/tests/utils/mockRepositories';
import { buildImage } from '@/tests/utils/fixtures';
import { IImageRepository } from '@/repositories/interfaces';
import { IObjectStorage } from '@/interfaces/IObjectStorage';
import { IJobQueue } from '@/jobs/JobQueue';
import { AppJobs } from '@/jobs/jobs';
import { NotFoundError, ValidationError } from '@/errors';

const BUCKET_URL = 'https://test-bucket.s3.amazonaws.com/';
const ADMIN_ID = '01HADMIN000000000000000001';

describe('media helpers', () => {
  it('should reduce client file names to safe key segments', () => {
    expect(sanitizeFileName('C:\\photos\\My Pic (1).JPG')).toBe('My_Pic_1_.JPG');
    expect(sanitizeFileName('../../etc/passwd')).toBe('passwd');
    expect(sanitizeFileName('.env')).toBe('env');
    expect(sanitizeFileName('..')).toBe('upload');
  });

  it('should check extension and size of an upload', () => {
    expect(uploadErrors({ clientName: 'photo.JPG', contentType: 'image/jpeg', size: 1000 })).toEqual([]);
    expect(uploadErrors({ clientName: 'notes.pdf', contentType: 'application/pdf', size: 20_000_000 })).toEqual([
      'You have selected an unacceptable file type',
      'Too large',
    ]);
  });
});

describe('MediaService', () => {
  let mediaService: MediaService;
  let mockImageRepo: jest.Mocked<IImageRepository>;
  let mockStorage: jest.Mocked<IObjectStorage>;
  let mockJobQueue: jest.Mocked<IJobQueue<AppJobs>>;

  beforeEach(() => {
    mockImageRepo = createMockImageRepository();
    mockStorage = createMockObjectStorage();
    mockJobQueue = createMockJobQueue();
    mediaService = new MediaService(mockImageRepo, mockStorage, mockJobQueue);
  });

  describe('listImages', () => {
    it('should reset pages below one and detect the end of the timeline', async () => {
      mockImageRepo.listImages.mockResolvedValue([buildImage()]);

      const result = await mediaService.listImages({ page: 0 });

      expect(mockImageRepo.listImages).toHaveBeenCalledWith(20, 0);
      expect(result.page).toBe(1);
      expect(result.endOfTimeline).toBe(true);
    });

    it('should offset later pages', async () => {
      mockImageRepo.listImages.mockResolvedValue([]);

      await mediaService.listImages({ page: 3, perPage: 10 });

      expect(mockImageRepo.listImages).toHaveBeenCalledWith(10, 20);
    });
  });

  describe('feedImages', () => {
    it('should fetch one extra row to know whether more follow', async () => {
      const first = buildImage({ id: '01HIMG00000000000000000003', insertedAt: new Date('2024-03-03T00:00:00.000Z') });
      const second = buildImage({ id: '01HIMG00000000000000000002', insertedAt: new Date('2024-03-02T00:00:00.000Z') });
      const third = buildImage({ id: '01HIMG00000000000000000001' });
      mockImageRepo.listImagesAfter.mockResolvedValue([first, second, third]);

      const result = await mediaService.feedImages({ limit: 2 });

      expect(mockImageRepo.listImagesAfter).toHaveBeenCalledWith(null, 3);
      expect(result.images).toEqual([first, second]);
      expect(result.hasMore).toBe(true);
      expect(result.nextCursor).toBe('2024-03-02T00:00:00.000Z_01HIMG00000000000000000002');
    });

    it('should continue after a cursor', async () => {
      mockImageRepo.listImagesAfter.mockResolvedValue([]);

      const result = await mediaService.feedImages({ cursor: '2024-03-02T00:00:00.000Z_01HIMG00000000000000000002' });

      expect(mockImageRepo.listImagesAfter).toHaveBeenCalledWith(
        { insertedAt: new Date('2024-03-02T00:00:00.000Z'), id: '01HIMG00000000000000000002' },
        21
      );
      expect(result).toEqual({ images: [], hasMore: false, nextCursor: null });
    });

    it('should carry the id of the last row when timestamps tie', async () => {
      const insertedAt = new Date('2024-03-02T08:30:00.250Z');
      const newer = buildImage({ id: '01HIMG00000000000000000009', insertedAt });
      const older = buildImage({ id: '01HIMG00000000000000000008', insertedAt });
      const next = buildImage({ id: '01HIMG00000000000000000007', insertedAt });
      mockImageRepo.listImagesAfter.mockResolvedValueOnce([newer, older, next]);
      mockImageRepo.listImagesAfter.mockResolvedValueOnce([next]);

      const firstPage = await mediaService.feedImages({ limit: 2 });
      const secondPage = await mediaService.feedImages({ cursor: firstPage.nextCursor ?? '', limit: 2 });

      expect(firstPage.nextCursor).toBe('2024-03-02T08:30:00.250Z_01HIMG00000000000000000008');
      expect(mockImageRepo.listImagesAfter).toHaveBeenLastCalledWith(
        { insertedAt, id: '01HIMG00000000000000000008' },
        3
      );
      expect(secondPage).toEqual({ images: [next], hasMore: false, nextCursor: null });
    });

    it('should reject a malformed cursor', async () => {
      await expect(mediaService.feedImages({ cursor: 'garbage' })).rejects.toThrow(new ValidationError('Invalid cursor'));
    });
  });

  describe('presignUploads', () => {
    it('should refuse more than ten files', async () => {
      const uploads = Array.from({ length: 11 }, (_, index) => ({
        clientName: `photo-${index}.jpg`,
        contentType: 'image/jpeg',
        size: 1000,
      }));

      await expect(mediaService.presignUploads(uploads)).rejects.toThrow(new ValidationError('Too many files'));
    });

    it('should report problems per file', async () => {
      const error = await mediaService
        .presignUploads([
          { clientName: 'photo.jpg', contentType: 'image/jpeg', size: 1000 },
          { clientName: 'notes.pdf', contentType: 'application/pdf', size: 1000 },
        ])
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toHaveProperty('message', 'You have selected an unacceptable file type');
      expect(error).toHaveProperty('errors', {
        files: [{ clientName: 'notes.pdf', errors: ['You have selected an unacceptable file type'] }],
      });
      expect(mockStorage.presignUpload).not.toHaveBeenCalled();
    });

    it('should presign a public key per file', async () => {
      mockStorage.presignUpload.mockResolvedValue({ url: BUCKET_URL, fields: { policy: 'test-policy' } });

      const [upload] = await mediaService.presignUploads([
        { clientName: 'Summer Trip.png', contentType: 'image/png', size: 5000 },
      ]);

      expect(upload?.key).toMatch(/^public\/[0-9A-Z]{26}_Summer_Trip\.png$/);
      expect(upload).toEqual(
        expect.objectContaining({ clientName: 'Summer Trip.png', url: BUCKET_URL, fields: { policy: 'test-policy' } })
      );
      expect(mockStorage.presignUpload).toHaveBeenCalledWith({
        key: upload?.key,
        contentType: 'image/png',
        maxSizeBytes: 10_000_000,
        expiresInSeconds: 3600,
      });
    });
  });

  describe('registerUploads', () => {
    it('should refuse keys outside the upload prefix', async () => {
      await expect(
        mediaService.registerUploads(ADMIN_ID, [
          { key: 'private/secret.jpg', clientName: 'secret.jpg', contentType: 'image/jpeg', size: 10 },
        ])
      ).rejects.toThrow(new ValidationError('Invalid upload key'));
      expect(mockImageRepo.createImages).not.toHaveBeenCalled();
    });

    it('should create images and queue their processing', async () => {
      const image = buildImage({ rawImagePath: `${BUCKET_URL}public/01HKEY_photo.jpg` });
      mockImageRepo.createImages.mockResolvedValue([image]);

      const images = await mediaService.registerUploads(ADMIN_ID, [
        { key: 'public/01HKEY_photo.jpg', clientName: 'photo.jpg', contentType: 'image/jpeg', size: 2048 },
      ]);

      expect(images).toEqual([image]);
      expect(mockImageRepo.createImages).toHaveBeenCalledWith([
        {
          userId: ADMIN_ID,
          rawImagePath: `${BUCKET_URL}public/01HKEY_photo.jpg`,
          uploadData: { key: 'public/01HKEY_photo.jpg', clientName: 'photo.jpg', contentType: 'image/jpeg', size: 2048 },
        },
      ]);
      expect(mockJobQueue.enqueue).toHaveBeenCalledWith(
        'image_processing',
        { imageId: image.id },
        { maxAttempts: 3 }
      );
    });
  });

  describe('getImage', () => {
    it('should serve the requested rendition', async () => {
      mockImageRepo.findImageById.mockResolvedValue(
        buildImage({ optimizedImagePath: `${BUCKET_URL}public/optimized/abc.webp` })
      );

      const result = await mediaService.getImage('01HIMG00000000000000000001', 'optimized');

      expect(result.version).toBe('optimized');
      expect(result.url).toBe(`${BUCKET_URL}public/optimized/abc.webp`);
    });

    it('should fall back to the thumbnail, then the raw upload', async () => {
      mockImageRepo.findImageById.mockResolvedValue(buildImage());

      const result = await mediaService.getImage('01HIMG00000000000000000001', 'poster');

      expect(result.version).toBe('thumbnail');
      expect(result.url).toBe('https://test-bucket.s3.amazonaws.com/uploads/abc.jpg');
    });

    it('should throw NotFoundError for unknown images', async () => {
      mockImageRepo.findImageById.mockResolvedValue(null);

      await expect(mediaService.getImage('missing')).rejects.toThrow(new NotFoundError('Image not found'));
    });
  });

  describe('deleteImage', () => {
    it('should delete every stored object and the row even when one object fails', async () => {
      mockImageRepo.findImageById.mockResolvedValue(
        buildImage({
          rawImagePath: `${BUCKET_URL}public/abc.jpg`,
          optimizedImagePath: `${BUCKET_URL}public/optimized/abc.webp`,
          thumbnailPath: 'https://elsewhere.example.org/abc.webp',
        })
      );
      mockStorage.deleteObject.mockRejectedValueOnce(new Error('access denied'));

      const result = await mediaService.deleteImage('01HIMG00000000000000000001');

      expect(result).toEqual({ message: 'Image deleted' });
      expect(mockStorage.deleteObject.mock.calls).toEqual([['public/abc.jpg'], ['public/optimized/abc.webp']]);
      expect(mockImageRepo.deleteImage).toHaveBeenCalledWith('01HIMG00000000000000000001');
    });
  });
});
