import { v4 as uuidv4 } from 'uuid';

export function generateInvocationId(): string {
  return `inv-${uuidv4()}`;
}
