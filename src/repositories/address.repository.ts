import { query } from '@/config/database';
import { Address } from '@/models';
import { IAddressRepository } from './interfaces/IAddressRepository';

const ADDRESS_COLUMNS = `
  id,
  user_id AS "userId",
  address,
  city,
  region,
  postal_code AS "postalCode",
  country,
  is_billing AS "isBilling"
`;

/**
 * Address Repository
 */
export class AddressRepository implements IAddressRepository {
  async findById(addressId: string): Promise<Address | null> {
    const result = await query<Address>(`SELECT ${ADDRESS_COLUMNS} FROM addresses WHERE id = $1`, [
      addressId,
    ]);

    return result.rows[0] ?? null;
  }

  async findBillingAddress(userId: string): Promise<Address | null> {
    const result = await query<Address>(
      `
      SELECT ${ADDRESS_COLUMNS}
      FROM addresses
      WHERE user_id = $1 AND is_billing = true
      LIMIT 1
      `,
      [userId]
    );

    return result.rows[0] ?? null;
  }
}
