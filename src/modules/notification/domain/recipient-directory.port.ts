export interface Recipient {
  id: number;
  email: string;
  isActive: boolean;
}

/**
 * Read-only view of the user accounts owned by the accounts service.
 */
export interface RecipientDirectory {
  findById(id: number): Promise<Recipient | null>;
}

export const RECIPIENT_DIRECTORY = Symbol('RECIPIENT_DIRECTORY');
