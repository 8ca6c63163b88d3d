import { Request } from 'express';
import { UserRole } from '../../users/enums/user-role.enum';

export interface AuthenticatedUser {
  id: string;
  role: UserRole;
}

export interface AuthenticatedRequest extends Request {
  user: AuthenticatedUser;
}
