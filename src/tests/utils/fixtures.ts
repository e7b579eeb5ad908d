/**
 * Test data builders
 * Every builder returns a complete row; pass overrides for what the test cares about.
 */

import {
  User,
  Payment,
  Post,
  Image,
  ExpenseReport,
  BankAccount,
  Address,
  Subscription,
  SignupApplication,
} from '@/models';

const INSERTED_AT = new Date('2024-03-01T12:00:00.000Z');

export function buildUser(overrides: Partial<User> = {}): User {
  return {
    id: '01HUSER0000000000000000001',
    email: 'astrid@example.org',
    firstName: 'Astrid',
    lastName: 'Lindgren',
    phoneNumber: null,
    state: 'active',
    role: 'member',
    boardPosition: null,
    mostConnectedCountry: 'Sweden',
    dateOfBirth: null,
    lifetimeMembershipAwardedAt: null,
    insertedAt: INSERTED_AT,
    updatedAt: INSERTED_AT,
    ...overrides,
  };
}

export function buildAdmin(overrides: Partial<User> = {}): User {
  return buildUser({
    id: '01HADMIN000000000000000001',
    email: 'admin@example.org',
    firstName: 'Ada',
    lastName: 'Admin',
    role: 'admin',
    ...overrides,
  });
}

export function buildSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: '01HSUB00000000000000000001',
    userId: '01HUSER0000000000000000001',
    stripeId: 'sub_test',
    stripeStatus: 'active',
    stripePriceId: 'price_single',
    planId: 'single',
    currentPeriodStart: new Date('2024-01-01T00:00:00.000Z'),
    currentPeriodEnd: new Date('2025-01-01T00:00:00.000Z'),
    endsAt: null,
    ...overrides,
  };
}

export function buildApplication(overrides: Partial<SignupApplication> = {}): SignupApplication {
  return {
    id: '01HAPP00000000000000000001',
    userId: '01HUSER0000000000000000001',
    birthDate: '1990-04-12',
    membershipType: 'single',
    submittedAt: INSERTED_AT,
    reviewedAt: null,
    reviewOutcome: null,
    reviewedByUserId: null,
    ...overrides,
  };
}

export function buildPayment(overrides: Partial<Payment> = {}): Payment {
  return {
    id: '01HPAY00000000000000000001',
    externalProvider: 'stripe',
    externalPaymentId: 'pi_test_1',
    userId: '01HUSER0000000000000000001',
    amount: '100.00',
    status: 'completed',
    paymentDate: INSERTED_AT,
    entityType: 'membership',
    entityId: null,
    property: null,
    ...overrides,
  };
}

export function buildPost(overrides: Partial<Post> = {}): Post {
  return {
    id: '01HPOST0000000000000000001',
    title: 'Midsummer Party',
    urlName: 'midsummer-party',
    previewText: null,
    body: null,
    rawBody: null,
    imageId: null,
    state: 'draft',
    featuredPost: false,
    publishedOn: null,
    deletedOn: null,
    authorId: '01HADMIN000000000000000001',
    insertedAt: INSERTED_AT,
    updatedAt: INSERTED_AT,
    ...overrides,
  };
}

export function buildImage(overrides: Partial<Image> = {}): Image {
  return {
    id: '01HIMG00000000000000000001',
    title: null,
    altText: null,
    userId: '01HADMIN000000000000000001',
    rawImagePath: 'https://test-bucket.s3.amazonaws.com/uploads/abc.jpg',
    optimizedImagePath: null,
    thumbnailPath: null,
    blurHash: null,
    width: null,
    height: null,
    processingState: 'unprocessed',
    uploadData: null,
    insertedAt: INSERTED_AT,
    ...overrides,
  };
}

export function buildExpenseReport(overrides: Partial<ExpenseReport> = {}): ExpenseReport {
  return {
    id: '01HREP00000000000000000001',
    userId: '01HUSER0000000000000000001',
    purpose: 'Crayfish party supplies',
    eventId: null,
    reimbursementMethod: 'check',
    addressId: null,
    bankAccountId: null,
    status: 'draft',
    certificationAccepted: false,
    submittedAt: null,
    reviewedByUserId: null,
    reviewedAt: null,
    reviewNote: null,
    insertedAt: INSERTED_AT,
    updatedAt: INSERTED_AT,
    ...overrides,
  };
}

export function buildBankAccount(overrides: Partial<BankAccount> = {}): BankAccount {
  return {
    id: '01HBANK0000000000000000001',
    userId: '01HUSER0000000000000000001',
    routingNumberCiphertext: 'sealed-routing',
    accountNumberCiphertext: 'sealed-account',
    accountNumberLast4: '6789',
    insertedAt: INSERTED_AT,
    updatedAt: INSERTED_AT,
    ...overrides,
  };
}

export function buildAddress(overrides: Partial<Address> = {}): Address {
  return {
    id: '01HADDR0000000000000000001',
    userId: '01HUSER0000000000000000001',
    address: '1 Main St',
    city: 'Oakland',
    region: 'CA',
    postalCode: '94612',
    country: 'USA',
    isBilling: true,
    ...overrides,
  };
}
