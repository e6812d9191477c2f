export interface AuthContext {
  userId: number;
  isAuthenticated: true;
}
