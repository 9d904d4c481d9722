/** Proton Pass export with one exact duplicate pair and one near-duplicate pair. */
export const PROTON_CSV = [
  'type,name,url,email,username,password,note,totp,createTime,modifyTime,vault',
  'login,Example,https://example.com,,alice,pw-1,,,1700000000,1700000000,Personal',
  'login,Example,https://example.com,,alice,pw-1,,,1700000000,1700000500,Personal',
  'login,Mail,https://mail.example,me@mail.example,,pw-2,first,,,1700000000,Personal',
  'login,Webmail,https://www.mail.example,,me@mail.example,pw-2,second,,,1700000900,Personal',
  'login,Bank,https://bank.example,,bob,pw-3,,,,,Personal',
].join('\n') + '\n';

export const MERGED_WEBMAIL_NOTES = [
  'second',
  'Merged from duplicates:\n- Alternative titles: Mail\n- URLs: https://mail.example\n- emails: me@mail.example',
  'first',
].join('\n\n');
