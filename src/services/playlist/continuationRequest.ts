import { ContinuationRequest, ContinuationToken, PlaylistContext } from '../../types/playlist';

/**
 * The endpoint takes the token twice, as `ctoken` and `continuation`, and
 * rejects requests whose values differ. Tokens arrive already escaped for a
 * query string and go out exactly as received. The client name/version headers are
 * fixed protocol values; once the remote service retires that version,
 * continuation requests stop returning data until the configured value is
 * updated.
 */
export function buildContinuationRequest(
  token: ContinuationToken,
  context: Pick<PlaylistContext, 'host' | 'clientName' | 'clientVersion'>
): ContinuationRequest {
  return {
    url: `https://${context.host}/browse_ajax?ctoken=${token}&continuation=${token}`,
    headers: {
      'X-YouTube-Client-Name': context.clientName,
      'X-YouTube-Client-Version': context.clientVersion,
    },
  };
}
