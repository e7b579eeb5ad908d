import { Address } from '@/models';

/**
 * Address Repository Interface
 */
export interface IAddressRepository {
  findById(addressId: string): Promise<Address | null>;

  findBillingAddress(userId: string): Promise<Address | null>;
}
