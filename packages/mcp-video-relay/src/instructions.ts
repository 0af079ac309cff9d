/** MCP server instructions for the agent. */
export const MCP_INSTRUCTIONS = `You can download videos for the user via the video relay server.

Usage:
- Pass the user's message (or just the URL) to download_video. Exactly one URL per request.
- Requests are processed one at a time. download_video returns when the video is ready; the user
  receives a log message with their queue position while waiting.
- On success, share download_url (single use, expires) and, if present, the warning about reduced bitrate.
- On "quality degradation too severe" or "URL is unsupported", tell the user and offer to retry with
  fallback: true. Fallback mode allows larger sources, any site yt-dlp supports, and any bitrate reduction.
- list_download_links shows handed-out links; close_download_link revokes one the user no longer needs.
- get_queue_status shows how many requests are active; list_supported_sites lists the allowlist.`;
