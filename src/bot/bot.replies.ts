export function startReply(firstName?: string): string {
  const name = firstName || 'there';
  return (
    `Hi ${name}! I'm your BCN Art Compass bot.\n\n` +
    "Tell me what kind of art or cultural events you're interested in, " +
    "and I'll ask the BCN Art Compass AI to help you discover exhibitions " +
    'and galleries in Barcelona.'
  );
}

export const HELP_REPLY =
  'You can send me any message like:\n' +
  '- "I love sculpture and don\'t like video art"\n' +
  '- "What art exhibitions are happening this weekend?"\n' +
  '- "I\'m in Gràcia, suggest something nearby"\n\n' +
  "I'll forward it to BCN Art Compass and reply with its recommendations.";

export const NO_RESPONSE_REPLY = 'No response from BCN Art Compass.';

export const BACKEND_UNAVAILABLE_REPLY =
  "I couldn't reach the BCN Art Compass backend right now. " +
  'Please try again in a moment.';
