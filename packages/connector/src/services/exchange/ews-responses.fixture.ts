/**
 * EWS response documents for tests.
 */

export interface FolderFixture {
  id: string;
  name: string;
  kind?: "CalendarFolder" | "Folder";
}

export interface ItemFixture {
  id: string;
  subject?: string;
  start: string;
  end?: string;
  allDay?: boolean;
  cancelled?: boolean;
  location?: string;
  body?: string;
  /** Period biases of the start time zone, e.g. "-PT13H" */
  zoneBiases?: string[];
}

function soap(body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">
  <s:Header><h:ServerVersionInfo MajorVersion="15" MinorVersion="20" /></s:Header>
  <s:Body>${body}</s:Body>
</s:Envelope>`;
}

export function findFolderResponse(folders: FolderFixture[], includesLast: boolean, nextOffset: number): string {
  const entries = folders
    .map((folder) => {
      const kind = folder.kind ?? "CalendarFolder";
      return `<t:${kind}><t:FolderId Id="${folder.id}" ChangeKey="ck" /><t:DisplayName>${folder.name}</t:DisplayName></t:${kind}>`;
    })
    .join("");
  return soap(`<m:FindFolderResponse><m:ResponseMessages>
<m:FindFolderResponseMessage ResponseClass="Success"><m:ResponseCode>NoError</m:ResponseCode>
<m:RootFolder IndexedPagingOffset="${nextOffset}" TotalItemsInView="99" IncludesLastItemInRange="${includesLast}">
<t:Folders>${entries}</t:Folders></m:RootFolder>
</m:FindFolderResponseMessage></m:ResponseMessages></m:FindFolderResponse>`);
}

export function findItemResponse(items: Array<{ id: string; start: string }>, includesLast: boolean): string {
  const entries = items
    .map((item) => `<t:CalendarItem><t:ItemId Id="${item.id}" ChangeKey="ck" /><t:Start>${item.start}</t:Start></t:CalendarItem>`)
    .join("");
  return soap(`<m:FindItemResponse><m:ResponseMessages>
<m:FindItemResponseMessage ResponseClass="Success"><m:ResponseCode>NoError</m:ResponseCode>
<m:RootFolder TotalItemsInView="${items.length}" IncludesLastItemInRange="${includesLast}">
<t:Items>${entries}</t:Items></m:RootFolder>
</m:FindItemResponseMessage></m:ResponseMessages></m:FindItemResponse>`);
}

export function getItemResponse(items: ItemFixture[]): string {
  const messages = items
    .map((item) => {
      const location = item.location === undefined ? "<t:Location />" : `<t:Location>${item.location}</t:Location>`;
      const body = item.body === undefined ? "" : `<t:Body BodyType="Text">${item.body}</t:Body>`;
      const periods = (item.zoneBiases ?? [])
        .map((bias, i) => `<t:Period Bias="${bias}" Name="Period ${i}" Id="period-${i}" />`)
        .join("");
      const zone = item.zoneBiases === undefined ? "" : `<t:StartTimeZone Id="Organizer Zone"><t:Periods>${periods}</t:Periods></t:StartTimeZone>`;
      return `<m:GetItemResponseMessage ResponseClass="Success"><m:ResponseCode>NoError</m:ResponseCode><m:Items>
<t:CalendarItem><t:ItemId Id="${item.id}" ChangeKey="ck" /><t:Subject>${item.subject ?? ""}</t:Subject>${body}
<t:Start>${item.start}</t:Start><t:End>${item.end ?? item.start}</t:End>
<t:IsAllDayEvent>${item.allDay === true}</t:IsAllDayEvent><t:IsCancelled>${item.cancelled === true}</t:IsCancelled>${location}${zone}
</t:CalendarItem></m:Items></m:GetItemResponseMessage>`;
    })
    .join("");
  return soap(`<m:GetItemResponse><m:ResponseMessages>${messages}</m:ResponseMessages></m:GetItemResponse>`);
}

export function errorResponse(operation: string, code: string, text: string, extra = ""): string {
  return soap(`<m:${operation}Response><m:ResponseMessages>
<m:${operation}ResponseMessage ResponseClass="Error"><m:MessageText>${text}</m:MessageText>
<m:ResponseCode>${code}</m:ResponseCode><m:DescriptiveLinkKey>0</m:DescriptiveLinkKey>${extra}
</m:${operation}ResponseMessage></m:ResponseMessages></m:${operation}Response>`);
}

export function soapFault(faultString: string): string {
  return soap(`<s:Fault><faultcode xmlns:a="http://schemas.microsoft.com/exchange/services/2006/types">a:ErrorSchemaValidation</faultcode>
<faultstring xml:lang="en-US">${faultString}</faultstring></s:Fault>`);
}
