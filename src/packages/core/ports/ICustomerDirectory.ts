/**
 * Customer Records Port
 *
 * @module packages/core/ports/ICustomerDirectory
 */

export interface Customer {
  id: string;
  /** Always lowercase */
  name: string;
  email: string | null;
  phone: string | null;
  createdAt: string;
}

export interface NewCustomer {
  /** Identity issued by the upstream identity provider; generated when omitted */
  id?: string;
  name: string;
  email?: string | null;
  phone?: string | null;
}

export interface ICustomerDirectory {
  /** Create a customer; name is lowercased, email must be unique when present */
  createCustomer(input: NewCustomer): Promise<Customer>;

  getCustomer(customerId: string): Promise<Customer | null>;

  /** Like getCustomer, but throws NotFoundError */
  requireCustomer(customerId: string): Promise<Customer>;
}
