import { NotificationService } from '@/services/notification.service';
import { escapeHtml, expenseReportStatusEmail } from '@/services/notification.templates';
import { createMockNotifier } from '@/tests/utils/mockRepositories';
import { buildUser } from '@/tests/utils/fixtures';
import { INotifier } from '@/interfaces/INotifier';

describe('notification templates', () => {
  it('should escape markup in the html part only', () => {
    const email = expenseReportStatusEmail('Bo', 'Snacks & <drinks>', 'rejected', null);

    expect(email.subject).toBe('Expense report rejected');
    expect(email.text).toBe('Hi Bo,\n\nYour expense report "Snacks & <drinks>" was rejected.');
    expect(email.html).toBe(
      '<p>Hi Bo,</p>\n<p>Your expense report &quot;Snacks &amp; &lt;drinks&gt;&quot; was rejected.</p>'
    );
  });

  it('should add the reviewer note when there is one', () => {
    const email = expenseReportStatusEmail(null, 'Lanterns', 'paid', 'Sent by check');

    expect(email.text).toBe(
      'Hi,\n\nYour expense report "Lanterns" has been paid.\n\nNote from the reviewer: Sent by check'
    );
  });

  it("should escape quotes and apostrophes", () => {
    expect(escapeHtml(`"O'Brien"`)).toBe('&quot;O&#39;Brien&quot;');
  });
});

describe('NotificationService', () => {
  let service: NotificationService;
  let mockNotifier: jest.Mocked<INotifier>;

  beforeEach(() => {
    mockNotifier = createMockNotifier();
    service = new NotificationService(mockNotifier);
  });

  it('should send the approval email to the member', async () => {
    await expect(service.applicationReviewed(buildUser(), true)).resolves.toBe(true);

    expect(mockNotifier.send).toHaveBeenCalledWith({
      to: 'astrid@example.org',
      subject: 'Your membership application was approved',
      text: 'Hi Astrid,\n\nYour membership application has been approved. Welcome, you are now a member!',
      html: '<p>Hi Astrid,</p>\n<p>Your membership application has been approved. Welcome, you are now a member!</p>',
    });
  });

  it('should use the plain subject for rejections', async () => {
    await service.applicationReviewed(buildUser(), false);

    expect(mockNotifier.send).toHaveBeenCalledWith(
      expect.objectContaining({ subject: 'Your membership application' })
    );
  });

  it('should report a message the provider did not accept', async () => {
    mockNotifier.send.mockResolvedValue(false);

    await expect(service.membershipPlanChanged(buildUser(), 'Single', 'Family')).resolves.toBe(false);
  });

  it('should not throw when the provider fails', async () => {
    mockNotifier.send.mockRejectedValue(new Error('provider down'));

    await expect(
      service.expenseReportSubmitted(buildUser(), { purpose: 'Lanterns' }, '12.00')
    ).resolves.toBe(false);
  });
});
