import { ExecutionContext, ForbiddenException } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { RolesGuard } from './roles.guard';
import { UserRole } from '../../users/enums/user-role.enum';

function mockContext(role: UserRole | null): ExecutionContext {
  return {
    getHandler: () => ({}),
    getClass: () => ({}),
    switchToHttp: () => ({
      getRequest: () => ({ user: role ? { id: 'user-1', role } : null }),
    }),
  } as unknown as ExecutionContext;
}

describe('RolesGuard', () => {
  let guard: RolesGuard;
  let reflector: Reflector;

  beforeEach(() => {
    reflector = new Reflector();
    guard = new RolesGuard(reflector);
  });

  it('allows admin through', () => {
    jest
      .spyOn(reflector, 'getAllAndOverride')
      .mockReturnValue([UserRole.ADMIN]);

    expect(guard.canActivate(mockContext(UserRole.ADMIN))).toBe(true);
  });

  it('accepts any one of several roles', () => {
    jest
      .spyOn(reflector, 'getAllAndOverride')
      .mockReturnValue([UserRole.ORGANIZER, UserRole.ADMIN]);

    expect(guard.canActivate(mockContext(UserRole.ORGANIZER))).toBe(true);
  });

  it('rejects a student on an admin route with ForbiddenException', () => {
    jest
      .spyOn(reflector, 'getAllAndOverride')
      .mockReturnValue([UserRole.ADMIN]);

    expect(() => guard.canActivate(mockContext(UserRole.STUDENT))).toThrow(
      'Requires one of the roles: admin',
    );
  });

  it('rejects unauthenticated user', () => {
    jest
      .spyOn(reflector, 'getAllAndOverride')
      .mockReturnValue([UserRole.ADMIN]);

    expect(() => guard.canActivate(mockContext(null))).toThrow(
      ForbiddenException,
    );
  });

  it('allows through when no roles are required', () => {
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(undefined);

    expect(guard.canActivate(mockContext(UserRole.STUDENT))).toBe(true);
  });
});
