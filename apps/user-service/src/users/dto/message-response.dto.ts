/** Plain acknowledgement body for mutations that return no resource */
export class MessageResponseDto {
  constructor(readonly message: string) {}
}
