export type UserRole = "admin" | "user";

export interface AuthContext {
  userId: string;
  email: string;
  role: UserRole;
  isAuthenticated: boolean;
}
