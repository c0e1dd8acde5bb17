export interface Category {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Create-request body and create-response echo. Carries no id.
 */
export interface CategoryDto {
  name: string;
  description?: string | null;
}

export interface CategoryResponse {
  id: number;
  name: string;
  description: string | null;
}
