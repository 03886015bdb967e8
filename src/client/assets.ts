/**
 * Static assets written alongside the generated pages.
 */

/** css/style.css */
export const SITE_STYLESHEET = `/* General Styles */
* {
    margin: 0;
    padding: 0;
    box-sizing: border-box;
}

body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, 'Open Sans', 'Helvetica Neue', sans-serif;
    line-height: 1.6;
    color: #333;
    background-color: #f5f5f5;
}

.container {
    max-width: 800px;
    margin: 0 auto;
    padding: 20px;
}

/* Header Styles */
.main-header {
    text-align: center;
    margin-bottom: 30px;
    padding: 20px 0;
    border-bottom: 1px solid #ddd;
}

.main-header h1 {
    font-size: 2.5rem;
    margin-bottom: 10px;
    color: #007aff;
}

.main-header p {
    font-size: 1.2rem;
    color: #666;
}

/* Search Bar */
.search-bar {
    margin-bottom: 20px;
}

#chat-search {
    width: 100%;
    padding: 12px;
    border: 1px solid #ddd;
    border-radius: 8px;
    font-size: 1rem;
}

/* Chat List */
.chat-list {
    display: flex;
    flex-direction: column;
    gap: 10px;
}

.chat-item {
    display: flex;
    justify-content: space-between;
    align-items: center;
    padding: 15px;
    background-color: white;
    border-radius: 10px;
    text-decoration: none;
    color: inherit;
    box-shadow: 0 2px 5px rgba(0, 0, 0, 0.1);
    transition: transform 0.2s, box-shadow 0.2s;
}

.chat-item:hover {
    transform: translateY(-2px);
    box-shadow: 0 4px 8px rgba(0, 0, 0, 0.15);
}

.chat-info {
    flex: 1;
}

.chat-name {
    font-size: 1.2rem;
    margin-bottom: 5px;
    color: #333;
}

.chat-preview {
    color: #666;
    font-size: 0.9rem;
    white-space: nowrap;
    overflow: hidden;
    text-overflow: ellipsis;
}

.chat-date {
    color: #999;
    font-size: 0.8rem;
}

/* Chat Page Styles */
.chat-container {
    max-width: 800px;
    margin: 0 auto;
    padding: 20px;
    background-color: white;
    min-height: 100vh;
}

header {
    padding-bottom: 15px;
    margin-bottom: 20px;
    border-bottom: 1px solid #ddd;
}

header h1 {
    font-size: 1.8rem;
    margin: 10px 0;
}

.back-button {
    color: #007aff;
    text-decoration: none;
    font-size: 1rem;
    display: inline-block;
    margin-bottom: 10px;
}

.participants {
    color: #666;
    font-size: 0.9rem;
}

/* Messages */
.messages {
    display: flex;
    flex-direction: column;
    gap: 15px;
}

.date-divider {
    text-align: center;
    color: #999;
    font-size: 0.8rem;
    margin: 15px 0;
    position: relative;
}

.date-divider::before,
.date-divider::after {
    content: "";
    display: inline-block;
    width: 40%;
    height: 1px;
    background-color: #ddd;
    vertical-align: middle;
    margin: 0 10px;
}

.message-incoming,
.message-outgoing {
    max-width: 80%;
    padding: 10px 15px;
    border-radius: 18px;
    position: relative;
}

.message-incoming {
    align-self: flex-start;
    background-color: #e5e5ea;
}

.message-outgoing {
    align-self: flex-end;
    background-color: #007aff;
    color: white;
}

.message-header {
    display: flex;
    justify-content: space-between;
    margin-bottom: 5px;
    font-size: 0.8rem;
}

.message-outgoing .message-header {
    color: rgba(255, 255, 255, 0.8);
}

.message-content p {
    margin-bottom: 8px;
}

.message-content p:last-child {
    margin-bottom: 0;
}

.message-image {
    max-width: 100%;
    border-radius: 8px;
    margin-top: 5px;
}

.attachment-link {
    display: inline-block;
    margin-top: 5px;
    color: inherit;
    text-decoration: underline;
}

/* Toggled by the site script */
.message-image {
    cursor: zoom-in;
}

.message-image.expanded {
    max-width: none;
    cursor: zoom-out;
}

.error-message {
    color: #c00;
    font-size: 0.8rem;
}

/* Responsive Adjustments */
@media (max-width: 600px) {
    .chat-item {
        flex-direction: column;
        align-items: flex-start;
    }

    .chat-date {
        align-self: flex-end;
        margin-top: 5px;
    }

    .message-incoming,
    .message-outgoing {
        max-width: 90%;
    }
}
`;

/**
 * js/script.js: substring search over the chat list and click-to-expand
 * for inline images. Plain browser script, no bundling.
 */
export const SITE_SCRIPT = `document.addEventListener('DOMContentLoaded', () => {
  const search = document.getElementById('chat-search');
  if (search) {
    search.addEventListener('input', () => {
      const term = search.value.trim().toLowerCase();
      document.querySelectorAll('.chat-item').forEach((item) => {
        const name = item.querySelector('.chat-name')?.textContent ?? '';
        const preview = item.querySelector('.chat-preview')?.textContent ?? '';
        const matches = name.toLowerCase().includes(term) || preview.toLowerCase().includes(term);
        item.style.display = matches ? 'flex' : 'none';
      });
    });
  }

  document.querySelectorAll('.message-image').forEach((img) => {
    img.addEventListener('click', () => img.classList.toggle('expanded'));
    img.addEventListener('load', () => img.classList.add('loaded'));
    img.addEventListener('error', () => {
      img.style.display = 'none';
      const notice = document.createElement('p');
      notice.className = 'error-message';
      notice.textContent = 'Image could not be loaded';
      img.parentNode?.appendChild(notice);
    });
  });
});
`;
