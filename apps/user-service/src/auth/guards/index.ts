export { JwtAuthGuard } from './jwt-auth.guard';
export { StaffGuard } from './staff.guard';
