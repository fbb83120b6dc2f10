export type MailTemplates = {
  subject: string;
  bodyHtml: string;
  tableRowHtml: string;
};

export const DEFAULT_SUBJECT = "证件到期提醒 - {count}个证件需要关注 ({today_date})";

export const DEFAULT_BODY_HTML = `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>证件到期提醒</title>
</head>
<body>
    <h2>证件到期提醒</h2>
    <p>以下证件即将到期，请及时处理：</p>
    <table border="1" style="border-collapse: collapse; width: 100%;">
        <tr style="background-color: #f2f2f2;">
            <th>姓名</th>
            <th>证件类型</th>
            <th>到期日期</th>
            <th>剩余天数</th>
            <th>备注</th>
        </tr>
        {table_rows}
    </table>
    <br>
    <p>此邮件由系统自动发送，请勿回复。</p>
</body>
</html>`;

export const DEFAULT_TABLE_ROW_HTML = `<tr>
            <td>{person_name}</td>
            <td>{document_type}</td>
            <td>{expiry_date}</td>
            <td style="color: {color};">{days_left}</td>
            <td>{remarks}</td>
        </tr>`;

export const DEFAULT_TEMPLATES: MailTemplates = {
  subject: DEFAULT_SUBJECT,
  bodyHtml: DEFAULT_BODY_HTML,
  tableRowHtml: DEFAULT_TABLE_ROW_HTML
};

export const TEST_MAIL_SUBJECT = "证件管理系统 - 测试邮件 ({send_time})";

export const TEST_MAIL_HTML = `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <title>测试邮件</title>
</head>
<body>
    <h2>证件管理系统测试邮件</h2>
    <p>这是一封测试邮件，用于验证邮件配置是否正确。</p>
    <p><strong>发送时间：</strong>{send_time}</p>
    <p><strong>发送服务器：</strong>由故障转移链中第一个可用的服务器发送</p>
    <p>此邮件由系统自动发送，请勿回复。</p>
</body>
</html>`;
