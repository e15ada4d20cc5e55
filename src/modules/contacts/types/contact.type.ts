export interface ContactRead {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  /** 'YYYY-MM-DD' */
  birthday: string;
  notes: string | null;
  userId: number;
}

export interface ContactListResponse {
  items: ContactRead[];
  total: number;
  limit: number;
  offset: number;
}

export interface ContactFields {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  birthday: string;
  notes: string | null;
}

export interface ContactFilters {
  q?: string;
  firstName?: string;
  lastName?: string;
  email?: string;
}
